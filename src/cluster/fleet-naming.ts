export interface FleetNodeName {
  /** Upper-cased model segment, e.g. "H100" for `violet-h100-001`. */
  model: string;
  ordinal: number;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Fleet naming convention: `<prefix>-<model>-<ddd>`.
 *
 * The model is one or more ASCII letters or digits; the ordinal is exactly
 * three decimal digits, so `000` is a valid ordinal while `1`, `0001`, and
 * `0xx` are not.
 */
export class FleetNamePattern {
  private readonly re: RegExp;

  constructor(readonly prefix: string) {
    this.re = new RegExp(`^${escapeRegExp(prefix)}-([A-Za-z0-9]+)-(\\d{3})$`);
  }

  matches(name: string): boolean {
    return this.re.test(name);
  }

  parse(name: string): FleetNodeName | null {
    const match = this.re.exec(name);
    if (!match) return null;
    const [, model, ordinal] = match;
    if (model === undefined || ordinal === undefined) return null;
    return { model: model.toUpperCase(), ordinal: Number.parseInt(ordinal, 10) };
  }

  describe(): string {
    return `${this.prefix}-<model>-<ddd>`;
  }
}
