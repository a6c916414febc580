export type PassName = 'annotations' | 'images' | 'text' | 'metadata';

export type ObjectOutcome =
  | { status: 'removed'; target: string; detail?: string }
  | { status: 'kept'; target: string }
  | { status: 'skipped'; target: string; reason: string };

export interface PassReport {
  pass: PassName;
  removed: number;
  outcomes: ObjectOutcome[];
}

export interface PruneReport {
  pages: number;
  annotations: number;
  images: number;
  textBlocks: number;
  metadata: number;
  passes: PassReport[];
}

export const METADATA_KEYS = ['Title', 'Subject', 'Author', 'Keywords', 'Creator', 'Producer'] as const;

export type MetadataKey = (typeof METADATA_KEYS)[number];
