import type { IncomingMessage } from 'node:http';
import busboy from 'busboy';
import { InputError } from './errors';

export interface UploadedFile {
  fileName: string;
  mimeType: string;
  bytes: Buffer;
}

export interface ParsedUpload {
  files: Record<string, UploadedFile>;
  fields: Record<string, string>;
}

export interface MultipartOptions {
  maxFileBytes: number;
}

/**
 * Buffers a multipart/form-data request in memory. Later parts with the same name replace
 * earlier ones. A file over `maxFileBytes` or a body that is not multipart is an {@link InputError}.
 */
export function parseMultipart(req: IncomingMessage, { maxFileBytes }: MultipartOptions): Promise<ParsedUpload> {
  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: maxFileBytes, files: 4, fields: 20 } });
    } catch (error) {
      reject(new InputError(`Se esperaba multipart/form-data: ${error instanceof Error ? error.message : String(error)}`));
      return;
    }

    const files: Record<string, UploadedFile> = {};
    const fields: Record<string, string> = {};
    let failure: Error | null = null;

    parser.on('file', (name, stream, info) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('limit', () => {
        failure = new InputError(`El archivo '${name}' supera el máximo de ${maxFileBytes} bytes`);
      });
      stream.on('end', () => {
        files[name] = {
          fileName: info.filename ?? name,
          mimeType: info.mimeType,
          bytes: Buffer.concat(chunks),
        };
      });
    });

    parser.on('field', (name, value) => {
      fields[name] = value;
    });

    parser.on('close', () => {
      if (failure) {
        reject(failure);
      } else {
        resolve({ files, fields });
      }
    });

    parser.on('error', (error) => {
      reject(new InputError(`Cuerpo multipart inválido: ${error instanceof Error ? error.message : String(error)}`));
    });

    req.pipe(parser);
  });
}
