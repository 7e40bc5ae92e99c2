export const CLASSIFICATION_PROMPT = `
Recibirás DOS archivos: un XML de factura electrónica (DIAN Colombia) y su representación en PDF. Devuelve SOLO un JSON válido, sin texto adicional:
{
  "documentType": "Invoice" | "CreditNote" | "DebitNote",
  "appliedCategory": "FEV_procesadas" | "NC_procesadas" | "ND_procesadas"
}
Si el XML no se entiende, devuelve:
{"documentType":"Unknown","appliedCategory":"Otros_Error"}
`.trim();

export const NO_ANSWER_TEXT = '(no answer read)';
