/**
 * Session cookies of one wiki connection. Updated from every response's
 * Set-Cookie headers; the last value received for a name wins.
 */
export class CookieJar {
  private readonly values = new Map<string, string>();

  update(setCookieHeaders: readonly string[]): void {
    for (const header of setCookieHeaders) {
      const [pair = ""] = header.split(";", 1);
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      this.values.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  get size(): number {
    return this.values.size;
  }

  /** Value for the Cookie request header, or undefined when the jar is empty. */
  header(): string | undefined {
    if (this.values.size === 0) return undefined;
    return [...this.values].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}
