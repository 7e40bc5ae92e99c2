// types.ts

export type DocumentType = 'Invoice' | 'CreditNote' | 'DebitNote' | 'Unknown';

export type ErrorCategory = 'FEV_Error' | 'NC_Error' | 'ND_Error' | 'Otros_Error';

/** Metadata submitted alongside an upload; echoed back by the structural validation endpoint. */
export type SubmissionMetadata = Record<string, unknown> & {
  categoria_aplicada?: unknown;
};

export interface ClassificationRequest {
  readonly xmlBytes: Buffer;
  readonly pdfBytes: Buffer;
  readonly xmlFileName: string;
  readonly pdfFileName: string;
  readonly originalCategory?: string;
  readonly metadata: Readonly<SubmissionMetadata>;
}

export type ValidationOutcome =
  | { status: 'Accepted' }
  | { status: 'Rejected'; failureReason: string };

export interface ClassificationResult {
  documentType: DocumentType;
  appliedCategory: string;
  rawAgentText?: string;
}

// --- Agent session ---

export type StageName = 'ensureReady' | 'submitPrompt' | 'attachFiles' | 'send' | 'readAnswer';

export type StageResult =
  | { status: 'ready' }
  | { status: 'not_found'; detail: string }
  | { status: 'timed_out'; detail: string };

export interface DiagnosticSnapshot {
  screenshotPath?: string;
  markupPath?: string;
}

export interface AgentFiles {
  pdfPath: string;
  xmlPath: string;
}

export type GatewayOutcome =
  | { status: 'classified'; result: ClassificationResult; rawText: string }
  | { status: 'unparsable'; rawText: string }
  | { status: 'failed'; stage: StageName; reason: string; snapshot?: DiagnosticSnapshot };

// --- HTTP responses ---

export type ProcessingState = 'Procesada' | 'Error';

export type StructuralValidationResponse = SubmissionMetadata & {
  xmlFileName: string;
  pdfFileName: string;
  estado: ProcessingState;
  categoria_aplicada: unknown;
  detalle_error: string | null;
};

export interface AgentClassificationResponse {
  documentType: DocumentType;
  categoria_aplicada: string;
}
