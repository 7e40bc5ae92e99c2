import { XMLValidator } from 'fast-xml-parser';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

const PREDEFINED_ENTITIES = new Set(['lt', 'gt', 'amp', 'apos', 'quot']);

// comments, CDATA sections, processing instructions (the declaration included) and the DOCTYPE
const NON_MARKUP = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE(?:[^[>]|\[[\s\S]*?\])*>/gi;
const ENTITY_DECLARATION = /<!ENTITY\s+(?:%\s+)?([^\s]+)/g;
const ENTITY_REFERENCE = /&([^\s&;<>"']*);/g;
const TAG = /<(\/?)([^\s/>]+)((?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>/g;
const ATTRIBUTE = /([^\s=/>]+)\s*=\s*(?:"[^"]*"|'[^']*')/g;

class StructureError extends Error {}

/** Blanks everything that is not element markup or text, keeping offsets and line breaks. */
const maskNonMarkup = (text: string): string => text.replace(NON_MARKUP, (section) => section.replace(/[^\n]/g, ' '));

const position = (text: string, index: number): string => {
  const before = text.slice(0, index);
  return `línea ${before.split('\n').length}, columna ${index - before.lastIndexOf('\n')}`;
};

const validatorPosition = (line: number | undefined, col: number | undefined): string => {
  const parts: string[] = [];
  if (Number.isFinite(line)) parts.push(`línea ${line}`);
  if (Number.isFinite(col)) parts.push(`columna ${col}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
};

const prefixOf = (name: string): string | null => {
  const separator = name.indexOf(':');
  return separator > 0 ? name.slice(0, separator) : null;
};

function checkEntities(text: string, masked: string) {
  const declared = new Set(Array.from(text.matchAll(ENTITY_DECLARATION), (match) => match[1]));
  for (const match of masked.matchAll(ENTITY_REFERENCE)) {
    const name = match[1];
    if (PREDEFINED_ENTITIES.has(name) || /^#(?:\d+|x[0-9a-fA-F]+)$/.test(name) || declared.has(name)) {
      continue;
    }
    throw new StructureError(`Entidad '${name}' no definida (${position(text, match.index ?? 0)})`);
  }
}

function checkNamespacePrefixes(text: string, masked: string) {
  const scopes: Array<Set<string>> = [new Set(['xml'])];
  for (const match of masked.matchAll(TAG)) {
    const [, closing, name, attributes, selfClosing] = match;
    if (closing) {
      scopes.pop();
      continue;
    }

    const inScope = new Set(scopes[scopes.length - 1]);
    const attributeNames = Array.from(attributes.matchAll(ATTRIBUTE), (attribute) => attribute[1]);
    for (const attributeName of attributeNames) {
      if (attributeName.startsWith('xmlns:')) {
        inScope.add(attributeName.slice('xmlns:'.length));
      }
    }

    const names = [name, ...attributeNames.filter((attributeName) => attributeName !== 'xmlns')];
    for (const candidate of names) {
      const prefix = prefixOf(candidate);
      if (prefix && prefix !== 'xmlns' && !inScope.has(prefix)) {
        throw new StructureError(
          `Prefijo de espacio de nombres '${prefix}' no declarado (${position(text, match.index ?? 0)})`,
        );
      }
    }

    if (!selfClosing) {
      scopes.push(inScope);
    }
  }
}

/**
 * Returns the reason the bytes are not a well-formed, namespace-consistent XML document, or null.
 * A leading UTF-8 byte-order mark is ignored.
 */
export function checkXml(bytes: Buffer): string | null {
  const body = bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? bytes.subarray(UTF8_BOM.length) : bytes;
  const text = body.toString('utf8');
  if (text.trim().length === 0) {
    return 'XML vacío o inválido';
  }

  const masked = maskNonMarkup(text);
  if (masked.trim().length === 0) {
    return 'XML sin elemento raíz';
  }

  try {
    const verdict = XMLValidator.validate(text);
    if (verdict !== true) {
      const { msg, line, col } = verdict.err;
      throw new StructureError(`${msg}${validatorPosition(line, col)}`);
    }
    checkEntities(text, masked);
    checkNamespacePrefixes(text, masked);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}
