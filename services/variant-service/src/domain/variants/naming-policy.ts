import { generateId } from '@image-variants/shared';

export interface BuildVariantFileNameInput {
  originalFileName: string;
  variantName: string;
  extension: string;
  generateUnique: boolean;
}

/**
 * `{variant}_{base}.{extension}` where `base` is the original base name without
 * its extension, or a fresh 128-bit id when `generateUnique` is set.
 */
export function buildVariantFileName(
  input: BuildVariantFileNameInput,
  generateUniqueId: () => string = generateId,
): string {
  const base = input.generateUnique ? generateUniqueId() : stripExtension(baseName(input.originalFileName));
  return `${input.variantName}_${base || 'image'}.${normalizeExtension(input.extension)}`;
}

export function buildVariantObjectKey(prefix: string, fileName: string): string {
  const normalizedPrefix = prefix.trim().replace(/^\/+|\/+$/g, '');
  return normalizedPrefix ? `${normalizedPrefix}/${fileName}` : fileName;
}

export function baseName(fileName: string): string {
  const segments = fileName.trim().split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

export function stripExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

export function fileExtension(fileName: string): string {
  const name = baseName(fileName);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}
