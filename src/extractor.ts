import { parse, type HTMLElement } from 'node-html-parser';
import { log } from './logger.js';
import { MalformedRecordError } from './errors.js';
import { UNSPECIFIED, identifyContractType, mentionsApprenticeship } from './contracts.js';
import type { MarkupConfig } from './config.js';
import type { JobListing } from './types.js';

const MIN_PARAGRAPH_LENGTH = 50;
const MIN_PARAGRAPHS = 5;

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function textOf(element: HTMLElement | null): string {
  return element ? clean(element.text) : '';
}

export function resolveLink(href: string, pageUrl: string): string | null {
  try {
    const url = new URL(href, pageUrl);
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

export interface ExtractorOptions {
  defaultLocation?: string;
  now?: () => Date;
}

export class Extractor {
  private readonly markup: MarkupConfig;
  private readonly defaultLocation: string;
  private readonly now: () => Date;

  constructor(markup: MarkupConfig, options: ExtractorOptions = {}) {
    this.markup = markup;
    this.defaultLocation = options.defaultLocation || UNSPECIFIED;
    this.now = options.now ?? (() => new Date());
  }

  // Cards first, then any anchor pointing at a posting.
  extract(html: string, pageUrl: string): JobListing[] {
    const root = parse(html, { comment: false });
    const cards = root.querySelectorAll(this.markup.card);

    if (cards.length > 0) {
      log.info(`${cards.length} listing cards on ${pageUrl}`);
      return this.collect(cards, pageUrl, (card) => this.fromCard(card, pageUrl));
    }

    const links = root.querySelectorAll('a').filter((a) => this.isPostingLink(a.getAttribute('href') ?? ''));
    if (links.length > 0) {
      log.warn(`No listing cards on ${pageUrl}; falling back to ${links.length} posting links`);
    }
    return this.collect(links, pageUrl, (link) => this.fromLink(link, pageUrl));
  }

  extractDescription(html: string): string | undefined {
    const root = parse(html, { comment: false, blockTextElements: { script: false, style: false, noscript: false } });

    for (const selector of this.markup.descriptionSelectors) {
      const text = textOf(root.querySelector(selector));
      if (text) return text;
    }

    const main = textOf(root.querySelector('main, article, div.main-content'));
    if (main) return main;

    const paragraphs = root.querySelectorAll('p');
    if (paragraphs.length > MIN_PARAGRAPHS) {
      const content = paragraphs
        .map((p) => textOf(p))
        .filter((text) => text.length > MIN_PARAGRAPH_LENGTH)
        .join('\n');
      if (content) return content;
    }
    return undefined;
  }

  private collect(
    fragments: HTMLElement[],
    pageUrl: string,
    build: (fragment: HTMLElement) => JobListing,
  ): JobListing[] {
    const listings: JobListing[] = [];
    for (const fragment of fragments) {
      try {
        listings.push(build(fragment));
      } catch (err: unknown) {
        if (!(err instanceof MalformedRecordError)) throw err;
        log.warn(err.message);
      }
    }
    return listings;
  }

  private isPostingLink(href: string): boolean {
    if (!href.includes(this.markup.postingPathFragment)) return false;
    return !this.markup.excludedLinkFragments.some((fragment) => href.includes(fragment));
  }

  private fromCard(card: HTMLElement, pageUrl: string): JobListing {
    const anchor = card.querySelector(this.markup.link) ?? card.querySelector('a');
    const url = this.requireUrl(anchor?.getAttribute('href'), pageUrl);

    const title = textOf(card.querySelector(this.markup.title)) || textOf(card.querySelector('h3, h2'));
    if (!title) throw new MalformedRecordError(pageUrl, 'title');

    const contractText = textOf(card.querySelector(this.markup.contract));
    const contractType = contractText || identifyContractType(title, '').contractType;

    let description = `Type de contrat: ${contractType}`;
    let isApprenticeship = false;
    if (mentionsApprenticeship(contractType)) {
      isApprenticeship = true;
      description += ' (Alternance)';
    } else if (mentionsApprenticeship(title)) {
      isApprenticeship = true;
      description += ' (Alternance mentionnée dans le titre)';
    }

    const published = textOf(card.querySelector(this.markup.published));
    if (published) description += ` | Publié: ${published}`;

    return this.build({
      url,
      title,
      company: textOf(card.querySelector(this.markup.company)) || UNSPECIFIED,
      location: textOf(card.querySelector(this.markup.location)) || this.defaultLocation,
      description,
      contractType,
      isApprenticeship,
    });
  }

  private fromLink(link: HTMLElement, pageUrl: string): JobListing {
    const url = this.requireUrl(link.getAttribute('href'), pageUrl);

    const title = textOf(link) || textOf(link.querySelector('h2, h3, p'));
    if (!title) throw new MalformedRecordError(pageUrl, 'title');

    let company = UNSPECIFIED;
    let location = this.defaultLocation;
    const label = link.getAttribute('aria-label');
    if (label) {
      const companyMatch = /chez\s+(.+?)(?:\s+à\s+|,|$)/i.exec(label);
      if (companyMatch) company = companyMatch[1].trim();
      const locationMatch = /\sà\s+([^,]+)/i.exec(label);
      if (locationMatch) location = locationMatch[1].trim();
    }

    const contract = identifyContractType(title, '');
    return this.build({
      url,
      title,
      company,
      location,
      description: `Type de contrat: ${contract.contractType}`,
      contractType: contract.contractType,
      isApprenticeship: contract.isApprenticeship,
    });
  }

  private requireUrl(href: string | undefined, pageUrl: string): string {
    const url = href ? resolveLink(href.trim(), pageUrl) : null;
    if (!url) throw new MalformedRecordError(pageUrl, 'link');
    return url;
  }

  private build(fields: Omit<JobListing, 'discoveredAt'>): JobListing {
    return Object.freeze({ ...fields, discoveredAt: this.now() });
  }
}
