const PLACEHOLDER_PATTERN = /\$\{\s*([^}:\s]+)\s*:?\s*([^}]+\s*)?\s*\}/g;

export abstract class StringUtils {
  /**
   * Replaces every `${key}` or `${key:default}` placeholder in `raw` with the
   * value computed for its key, falling back to the default when the
   * computed value is null.
   */
  public static format(
    raw: string,
    compute: (key: string) => string | null,
  ): string {
    let output = raw;

    for (const match of raw.matchAll(PLACEHOLDER_PATTERN)) {
      const placeholder = match[0];
      const key = match[1].trim();
      const defaultValue =
        typeof match[2] === 'undefined' ? null : match[2].trim();

      let computed = compute(key);
      if (computed === null) {
        if (defaultValue === null) {
          throw new Error('Missing required environment variable ' + key);
        }
        computed = defaultValue;
      }

      output = output.split(placeholder).join(computed);
    }

    return output;
  }
}
