import { logger } from '../services/logger';
import { measureExecution } from '../services/telemetry';
import type { ValidationOutcome } from '../types';
import { extractPdfText, type PdfTextExtractor } from './pdfTextExtractor';
import { checkXml } from './xmlStructure';

const PDF_SIGNATURE = Buffer.from('%PDF', 'latin1');
const MIN_PDF_TEXT_LENGTH = 10;
const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface DocumentValidatorOptions {
  extractText?: PdfTextExtractor;
}

export class DocumentValidator {
  private readonly extractText: PdfTextExtractor;

  constructor(options: DocumentValidatorOptions = {}) {
    this.extractText = options.extractText ?? extractPdfText;
  }

  /**
   * Structural check of an invoice pair. The PDF is checked first; the XML is only looked at
   * when the PDF passes.
   */
  async validate(pdfBytes: Buffer, xmlBytes: Buffer, correlationId?: string): Promise<ValidationOutcome> {
    return measureExecution('validation', 'document.validate', async () => {
      const pdfFailure = await this.checkPdf(pdfBytes);
      if (pdfFailure) {
        return this.reject(`Error en PDF: ${pdfFailure}`, correlationId);
      }

      const xmlFailure = checkXml(xmlBytes);
      if (xmlFailure) {
        return this.reject(`Error en XML: ${xmlFailure}`, correlationId);
      }

      logger.log('DocumentValidator', 'INFO', 'Par PDF/XML estructuralmente válido.', undefined, {
        correlationId,
        scope: 'validation',
      });
      return { status: 'Accepted' } as const;
    }, { correlationId });
  }

  private reject(failureReason: string, correlationId?: string): ValidationOutcome {
    logger.log('DocumentValidator', 'WARN', failureReason, undefined, { correlationId, scope: 'validation' });
    return { status: 'Rejected', failureReason };
  }

  private async checkPdf(bytes: Buffer): Promise<string | null> {
    if (bytes.length < PDF_SIGNATURE.length || !bytes.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE)) {
      return 'No es un PDF (firma %PDF ausente)';
    }
    try {
      const text = await this.extractText(bytes);
      if (text.trim().length < MIN_PDF_TEXT_LENGTH) {
        return 'PDF vacío o sin texto relevante';
      }
      return null;
    } catch (error) {
      return errorMessage(error);
    }
  }
}
