import fs from 'fs';
import { z } from 'zod';
import defaultRules from './default-rules.json';
import { ConfigurationError } from '../errors';

const patternSchema = z.string().min(1).refine(isValidRegExp, { message: 'Invalid regular expression' });

/**
 * Schema of a classification rule file
 */
export const classificationRuleSetSchema = z.object({
  domainRules: z.array(z.object({
    domainMatch: z.string().min(1).describe('Substring of the domain, or a wildcard such as *.shop.com'),
    patterns: z.array(patternSchema)
  })).default([]),
  productPatterns: z.array(patternSchema).default([]),
  paginationPatterns: z.array(patternSchema).default([]),
  listingMarkers: z.array(z.string().min(1)).default([]),
  numericExclusions: z.array(z.string().min(1)).default([])
});

export type ClassificationRuleSet = z.infer<typeof classificationRuleSetSchema>;

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch (error) {
    return false;
  }
}

/**
 * Validate an unknown value as a rule set
 * @throws ConfigurationError listing every invalid field
 */
export function parseClassificationRules(input: unknown, source = 'rules'): ClassificationRuleSet {
  const parsed = classificationRuleSetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid classification rules in ${source}`, issues);
  }
  return parsed.data;
}

/**
 * Read a rule set from a JSON file
 */
export function loadClassificationRules(filePath: string): ClassificationRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read classification rules from ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseClassificationRules(raw, filePath);
}

/**
 * Rules shipped with the crawler, tuned for the fashion shops it was first pointed at
 */
export const DEFAULT_CLASSIFICATION_RULES: ClassificationRuleSet = parseClassificationRules(defaultRules, 'default-rules.json');
