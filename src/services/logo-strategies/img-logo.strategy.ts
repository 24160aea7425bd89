import type { LogoMatch, ParsedPage } from '../../types';
import { BaseLogoStrategy } from './base.strategy';

/**
 * ImgLogoStrategy
 * First <img> flagged as a logo by `id="logo"` or a class containing "logo"
 */
export class ImgLogoStrategy extends BaseLogoStrategy {
  readonly name = 'img_logo';

  async tryDetect({ page, $ }: ParsedPage): Promise<LogoMatch | null> {
    for (const element of $('img').toArray()) {
      const img = $(element);
      if (!this.isFlagged(img.attr('id'), img.attr('class'))) continue;

      const src = img.attr('src');
      if (!this.hasValue(src)) continue;

      const match = this.match(src, page.url);
      if (match) return match;
    }

    return null;
  }

  private isFlagged(id: string | undefined, className: string | undefined): boolean {
    if (id === 'logo') return true;

    const classes = (className || '').split(/\s+/).filter(Boolean);
    return classes.some((c) => c.toLowerCase().includes('logo'));
  }
}
