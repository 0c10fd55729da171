import { Subject } from '../enums/index.js';

export const MCQ_OPTION_KEYS = ['A', 'B', 'C', 'D'] as const;
export const MIN_MCQ_OPTIONS = 2;

// External identifiers of the subjects in the question bank that consumes
// generated questions. A subject missing from this table maps to null.
export const SUBJECT_ID_MAP: Readonly<Record<string, string>> = {
  [Subject.PHYSICS]: '68c97d193c5fb93d44667a6c',
  [Subject.CHEMISTRY]: '68cbc78bcd2937d0d4dda433',
  [Subject.MATHEMATICS]: '68cbc7abcd2937d0d4dda434',
};

export const NO_WEB_CONTEXT_MARKER = 'No web context available. Rely on your internal knowledge.';
export const EMPTY_SUMMARY_PLACEHOLDER = 'No summary available.';
