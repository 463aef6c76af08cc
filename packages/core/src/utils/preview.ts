export const DEFAULT_PREVIEW_LENGTH = 50;
export const PREVIEW_ELLIPSIS = '...';

/**
 * First `maxLength` characters of `text`, with an ellipsis appended when anything was cut.
 */
export function previewText(text: string, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + PREVIEW_ELLIPSIS;
}
