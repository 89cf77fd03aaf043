const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Strip combining accents after NFD decomposition ("Müller" → "Muller")
 *
 * ß has no decomposition; callers fold it to "ss" first.
 */
export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS, "");
}
