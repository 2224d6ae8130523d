import { IUrlClassifier } from '../interfaces/IUrlClassifier';
import { Classification, UrlCategory } from '../interfaces/types';
import { ClassificationRuleSet, DEFAULT_CLASSIFICATION_RULES } from '../rules/ClassificationRules';
import { UrlUtils } from '../utils/UrlUtils';

interface CompiledDomainRule {
  matches: (domain: string) => boolean;
  patterns: RegExp[];
}

/**
 * Classifies URLs with ordered regular-expression rules.
 *
 * Product decision, first positive wins:
 * 1. patterns of every domain rule whose `domainMatch` matches the domain
 * 2. global product patterns
 * 3. a digit run in the last path segment, unless the path mentions an excluded word
 *
 * The category decision is independent of the product decision.
 */
export class PatternUrlClassifier implements IUrlClassifier {
  private readonly domainRules: CompiledDomainRule[];
  private readonly productPatterns: RegExp[];
  private readonly paginationPatterns: RegExp[];
  private readonly listingMarkers: string[];
  private readonly numericExclusions: string[];

  constructor(rules: ClassificationRuleSet = DEFAULT_CLASSIFICATION_RULES) {
    this.domainRules = rules.domainRules.map(rule => ({
      matches: PatternUrlClassifier.domainMatcher(rule.domainMatch),
      patterns: rule.patterns.map(pattern => new RegExp(pattern))
    }));
    this.productPatterns = rules.productPatterns.map(pattern => new RegExp(pattern));
    this.paginationPatterns = rules.paginationPatterns.map(pattern => new RegExp(pattern, 'i'));
    this.listingMarkers = rules.listingMarkers.map(marker => marker.toLowerCase());
    this.numericExclusions = rules.numericExclusions.map(word => word.toLowerCase());
  }

  classify(url: string, domain: string): Classification {
    return {
      isProduct: this.isProductUrl(url, domain),
      category: this.categorize(url)
    };
  }

  isProductUrl(url: string, domain: string): boolean {
    for (const rule of this.domainRules) {
      if (rule.matches(domain) && rule.patterns.some(pattern => pattern.test(url))) {
        return true;
      }
    }

    if (this.productPatterns.some(pattern => pattern.test(url))) {
      return true;
    }

    return this.hasNumericTrailingSegment(url);
  }

  categorize(url: string): UrlCategory {
    if (this.paginationPatterns.some(pattern => pattern.test(url))) {
      return UrlCategory.PAGINATION;
    }

    // Trailing slash so that `/collections` matches the `/collections/` marker
    const path = `${UrlUtils.getPath(url).toLowerCase()}/`;
    if (this.listingMarkers.some(marker => path.includes(marker))) {
      return UrlCategory.PRIORITY;
    }

    return UrlCategory.NORMAL;
  }

  private hasNumericTrailingSegment(url: string): boolean {
    const path = UrlUtils.getPath(url);
    const lastSegment = path.split('/').pop() ?? '';
    if (!/\d+/.test(lastSegment)) {
      return false;
    }

    const lowerPath = path.toLowerCase();
    return !this.numericExclusions.some(word => lowerPath.includes(word));
  }

  /**
   * `*` in a domain match is a wildcard over the whole domain; anything else is a substring
   */
  private static domainMatcher(domainMatch: string): (domain: string) => boolean {
    const lowerMatch = domainMatch.toLowerCase();
    if (!lowerMatch.includes('*')) {
      return domain => domain.toLowerCase().includes(lowerMatch);
    }

    const source = lowerMatch
      .split('*')
      .map(part => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    const expression = new RegExp(`^${source}$`);
    return domain => expression.test(domain.toLowerCase());
  }
}
