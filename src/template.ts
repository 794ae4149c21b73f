/**
 * `{name}` placeholder substitution used for SQL templates and Graphite
 * metric paths. `{{` and `}}` produce literal braces.
 *
 * @module template
 */

export class UnknownPlaceholderError extends Error {
  constructor(readonly placeholder: string) {
    super(`Unknown placeholder "${placeholder}".`);
    this.name = 'UnknownPlaceholderError';
  }
}

/**
 * Fill `{name}` placeholders in `template` from `values`.
 *
 * @throws UnknownPlaceholderError when a placeholder has no value.
 */
export function fillTemplate(
  template: string,
  values: Record<string, string | number | null>,
): string {
  return template.replace(/\{\{|\}\}|\{([^{}]*)\}/g, (match, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    const key = (name ?? '').trim();
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      throw new UnknownPlaceholderError(key);
    }
    const value = values[key];
    return value === null ? 'None' : String(value);
  });
}
