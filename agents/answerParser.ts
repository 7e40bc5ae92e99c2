import type { ClassificationResult, DocumentType } from '../types';

const DOCUMENT_TYPE_ALIASES: Record<string, DocumentType> = {
  invoice: 'Invoice',
  factura: 'Invoice',
  creditnote: 'CreditNote',
  notacredito: 'CreditNote',
  debitnote: 'DebitNote',
  notadebito: 'DebitNote',
  unknown: 'Unknown',
  desconocido: 'Unknown',
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParse = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Scans for balanced `{...}` blocks by brace depth and returns the first one that parses as a
 * JSON object. Braces inside string literals are not special-cased.
 */
export function extractFirstJson(text: string): Record<string, unknown> | null {
  let depth = 0;
  let start = -1;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') {
      if (depth === 0) start = i;
      depth += 1;
    } else if (ch === '}' && depth > 0) {
      depth -= 1;
      if (depth === 0 && start !== -1) {
        const candidate = tryParse(text.slice(start, i + 1));
        if (isRecord(candidate)) {
          return candidate;
        }
      }
    }
  }
  return null;
}

export function normalizeDocumentType(value: unknown): DocumentType {
  if (typeof value !== 'string') return 'Unknown';
  const key = value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[\s_-]+/g, '')
    .toLowerCase();
  return DOCUMENT_TYPE_ALIASES[key] ?? 'Unknown';
}

/**
 * Reads the agent's answer: the whole text as JSON first, then the first balanced object in it.
 * Returns null unless the object carries both `documentType` and `appliedCategory`.
 */
export function parseAgentAnswer(rawText: string): ClassificationResult | null {
  const direct = tryParse(rawText.trim());
  const parsed = isRecord(direct) ? direct : extractFirstJson(rawText);
  if (!parsed || !('documentType' in parsed) || !('appliedCategory' in parsed)) {
    return null;
  }

  const { documentType, appliedCategory } = parsed;
  return {
    documentType: normalizeDocumentType(documentType),
    appliedCategory: typeof appliedCategory === 'string' ? appliedCategory : '',
    rawAgentText: rawText,
  };
}
