/**
 * Link inference: turns bold mentions into wikilinks and maintains a
 * "Related Topics" section, using the knowledge index as a read-only oracle.
 */

import { KnowledgeIndex, DEFAULT_MAX_RESULTS, DEFAULT_MIN_RELEVANCE } from './index-manager.js';
import { stripExtension } from './filename.js';
import { LinkOpportunity } from './types.js';

export const MENTION_CONFIDENCE = 0.8;
export const DEFAULT_AUTO_LINK_CONFIDENCE = 0.6;
export const RELATED_SECTION_MIN_CONFIDENCE = 0.4;
export const RELATED_SECTION_HEADING = '## Related Topics';

export type LinkIndex = Pick<KnowledgeIndex, 'topicEntries' | 'findRelated' | 'getFileInfo'>;

export interface OpportunityOptions {
  minRelevance?: number;
  maxResults?: number;
}

export interface EnrichedNote {
  body: string;
  /** Targets that received an inline link */
  linked: string[];
  /** Targets listed in the Related Topics section */
  related: string[];
}

const BOLD_SPAN = /\*\*([^*]+)\*\*/g;
const RELATED_SECTION = /(^|\n)## Related Topics[ \t]*(?:\n[\s\S]*?)?(?=\n##|$)/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Topics are stored with underscores for spaces
function toTopicKey(mention: string): string {
  return mention.replace(/ /g, '_');
}

export class LinkInferencer {
  private index: LinkIndex;
  private defaults: Required<OpportunityOptions>;

  constructor(index: LinkIndex, defaults: OpportunityOptions = {}) {
    this.index = index;
    this.defaults = {
      minRelevance: defaults.minRelevance ?? DEFAULT_MIN_RELEVANCE,
      maxResults: defaults.maxResults ?? DEFAULT_MAX_RESULTS
    };
  }

  /**
   * Lower-cased text of each **bold** span, in order of appearance
   */
  *extractMentions(body: string): Generator<string> {
    for (const match of body.matchAll(BOLD_SPAN)) {
      yield match[1].toLowerCase();
    }
  }

  /**
   * Candidate link targets from topic mentions and from tag/topic similarity
   */
  findLinkOpportunities(
    filename: string,
    body: string,
    options: OpportunityOptions = {}
  ): LinkOpportunity[] {
    const minRelevance = options.minRelevance ?? this.defaults.minRelevance;
    const maxResults = options.maxResults ?? this.defaults.maxResults;

    const opportunities: LinkOpportunity[] = [];
    const seen = new Set<string>();
    const topics = this.index.topicEntries().filter(([topic]) => topic.length > 0);

    for (const mention of this.extractMentions(body)) {
      const key = toTopicKey(mention.trim());
      if (!key) {
        continue;
      }

      for (const [topic, files] of topics) {
        if (!key.includes(topic) && !topic.includes(key)) {
          continue;
        }
        for (const target of files) {
          const pair = `${target}\u0000${mention}`;
          if (target === filename || seen.has(pair)) {
            continue;
          }
          seen.add(pair);
          opportunities.push({ target, anchor: mention, confidence: MENTION_CONFIDENCE });
        }
      }
    }

    for (const { filename: target, score } of this.index.findRelated(filename, maxResults, minRelevance)) {
      opportunities.push({ target, confidence: score });
    }

    return opportunities;
  }

  /**
   * Add wikilinks to the body and return the enriched text
   */
  generateLinks(
    filename: string,
    body: string,
    autoLinkMinConfidence = DEFAULT_AUTO_LINK_CONFIDENCE
  ): string {
    return this.enrich(filename, body, autoLinkMinConfidence).body;
  }

  /**
   * Rewrite mentions into wikilinks, then build or replace the Related Topics section
   */
  enrich(
    filename: string,
    body: string,
    autoLinkMinConfidence = DEFAULT_AUTO_LINK_CONFIDENCE
  ): EnrichedNote {
    const opportunities = this.findLinkOpportunities(filename, body);

    let text = body;
    const linked: string[] = [];

    for (const { target, anchor, confidence } of opportunities) {
      if (!anchor || confidence < autoLinkMinConfidence) {
        continue;
      }

      const match = new RegExp(`\\*\\*(${escapeRegExp(anchor)})\\*\\*`, 'i').exec(text);
      if (!match) {
        continue;
      }

      const link = `[[${stripExtension(target)}|${match[1]}]]`;
      text = text.slice(0, match.index) + link + text.slice(match.index + match[0].length);
      if (!linked.includes(target)) {
        linked.push(target);
      }
    }

    const related = this.relatedTargets(opportunities);
    if (related.length > 0) {
      text = this.writeRelatedSection(text, related);
    }

    return { body: text, linked, related };
  }

  private relatedTargets(opportunities: LinkOpportunity[]): string[] {
    const targets: string[] = [];
    for (const { target, confidence } of opportunities) {
      if (confidence > RELATED_SECTION_MIN_CONFIDENCE && !targets.includes(target)) {
        targets.push(target);
      }
    }
    return targets;
  }

  private writeRelatedSection(body: string, targets: string[]): string {
    const lines = targets.map(target => {
      const name = stripExtension(target);
      const title = this.index.getFileInfo(target)?.title ?? name;
      return `- [[${name}]] - ${title}`;
    });
    const section = `${RELATED_SECTION_HEADING}\n${lines.join('\n')}\n`;

    if (RELATED_SECTION.test(body)) {
      return body.replace(RELATED_SECTION, (_whole, lead: string) => lead + section);
    }

    const trimmed = body.replace(/\s+$/, '');
    return trimmed ? `${trimmed}\n\n${section}` : section;
  }
}
