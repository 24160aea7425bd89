import type { LogoMatch, LogoSource, LogoStrategy, ParsedPage } from '../../types';

/**
 * BaseLogoStrategy
 * Common helpers for the logo detection strategies
 */
export abstract class BaseLogoStrategy implements LogoStrategy {
  abstract readonly name: LogoSource;

  abstract tryDetect(page: ParsedPage): Promise<LogoMatch | null>;

  /**
   * Resolve a relative, absolute or protocol-relative reference against the
   * page's final URL. Returns null when the reference cannot be parsed.
   */
  protected resolveUrl(reference: string, baseUrl: string): string | null {
    try {
      return new URL(reference, baseUrl).href;
    } catch {
      return null;
    }
  }

  protected hasValue(value: string | undefined): value is string {
    return value !== undefined && value.trim().length > 0;
  }

  protected match(reference: string, baseUrl: string): LogoMatch | null {
    const url = this.resolveUrl(reference, baseUrl);
    return url ? { url, source: this.name } : null;
  }
}
