// src/http/CookieJar.ts
/**
 * Session cookies carried between responses and later requests.
 *
 * Only name/value pairs are tracked; attributes (Path, Expires, …) are
 * dropped, and a later Set-Cookie for the same name replaces the value.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  public get size(): number {
    return this.cookies.size;
  }

  public get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  public set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  public delete(name: string): boolean {
    return this.cookies.delete(name);
  }

  public entries(): Array<[string, string]> {
    return [...this.cookies.entries()];
  }

  /** Absorb raw `Set-Cookie` header values. */
  public absorb(setCookieHeaders: readonly string[]): void {
    for (const header of setCookieHeaders) {
      const parsed = CookieJar.parseSetCookie(header);
      if (parsed) this.cookies.set(parsed.name, parsed.value);
    }
  }

  /** Value for a `Cookie` request header, or undefined when empty. */
  public toHeader(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return [...this.cookies.entries()].map(([n, v]) => `${n}=${v}`).join("; ");
  }

  public clone(): CookieJar {
    const copy = new CookieJar();
    for (const [name, value] of this.cookies) copy.set(name, value);
    return copy;
  }

  public static parseSetCookie(
    header: string
  ): { name: string; value: string } | undefined {
    const pair = header.split(";", 1)[0] ?? "";
    const eq = pair.indexOf("=");
    if (eq <= 0) return undefined;
    const name = pair.slice(0, eq).trim();
    if (!name) return undefined;
    return { name, value: pair.slice(eq + 1).trim() };
  }
}
