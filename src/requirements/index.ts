/**
 * Requirements extraction public surface
 */

export { RequirementsExtractor } from "./requirementsExtractor";
export type { RequirementsExtractorOptions } from "./requirementsExtractor";
export { isLowQualitySummary } from "./summaryQuality";
export { locateRequirementsSection } from "./sectionLocator";
export type { LocatedSection } from "./sectionLocator";
export { extractItems, splitSentences } from "./itemExtraction";
export { scoreItem, categorizeItem, rankItems } from "./scoring";
export { formatItem, formatSummary } from "./formatting";
