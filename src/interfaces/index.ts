export type { TextClassifier } from "./enrichment/textClassifier";
export type { RequirementsSummarizer } from "./enrichment/requirementsSummarizer";
export type { SourceCollaborator } from "./sources/sourceCollaborator";
export type { PostingNotifier } from "./notifications/postingNotifier";
