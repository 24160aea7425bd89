import type { LogoMatch, ParsedPage } from '../../types';
import { BaseLogoStrategy } from './base.strategy';

/**
 * OgImageStrategy
 * Uses the first `og:image` meta tag when it carries content
 */
export class OgImageStrategy extends BaseLogoStrategy {
  readonly name = 'og_image';

  async tryDetect({ page, $ }: ParsedPage): Promise<LogoMatch | null> {
    const content = $('meta[property="og:image"]').first().attr('content');
    if (!this.hasValue(content)) return null;

    return this.match(content, page.url);
  }
}
