import type { ErrorCategory } from '../types';

const PREFIX_CATEGORIES: ReadonlyArray<[prefix: string, category: ErrorCategory]> = [
  ['FEV_', 'FEV_Error'],
  ['NC_', 'NC_Error'],
  ['ND_', 'ND_Error'],
];

/**
 * Maps the category a document was filed under to the error bucket of its family:
 * `FEV_procesadas` → `FEV_Error`, `NC_*` → `NC_Error`, `ND_*` → `ND_Error`, anything else → `Otros_Error`.
 */
export function mapErrorCategory(category: string | null | undefined): ErrorCategory {
  if (!category) {
    return 'Otros_Error';
  }
  const match = PREFIX_CATEGORIES.find(([prefix]) => category.startsWith(prefix));
  return match ? match[1] : 'Otros_Error';
}
