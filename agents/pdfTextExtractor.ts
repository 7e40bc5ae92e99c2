import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.js';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';

export type PdfTextExtractor = (bytes: Uint8Array) => Promise<string>;

const isTextItem = (item: TextItem | TextMarkedContent): item is TextItem => 'str' in item;

/** Concatenates the text layer of every page, pages in order. */
export const extractPdfText: PdfTextExtractor = async (bytes) => {
  // pdfjs takes ownership of the buffer it is given
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
  });

  try {
    const pdf = await loadingTask.promise;
    let fullText = '';
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      fullText += textContent.items.filter(isTextItem).map((item) => item.str).join(' ');
    }
    return fullText;
  } finally {
    await loadingTask.destroy();
  }
};
