import type { LogoMatch, ParsedPage } from '../../types';
import { BaseLogoStrategy } from './base.strategy';

/**
 * FaviconStrategy
 * Falls back to the first icon-family <link> (icon, shortcut icon, apple-touch-icon, ...)
 */
export class FaviconStrategy extends BaseLogoStrategy {
  readonly name = 'favicon';

  async tryDetect({ page, $ }: ParsedPage): Promise<LogoMatch | null> {
    for (const element of $('link[rel]').toArray()) {
      const link = $(element);
      const rel = (link.attr('rel') || '').toLowerCase();
      if (!rel.includes('icon')) continue;

      const href = link.attr('href');
      if (!this.hasValue(href)) continue;

      const match = this.match(href, page.url);
      if (match) return match;
    }

    return null;
  }
}
