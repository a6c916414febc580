export type ExportFormat = 'pdf' | 'png' | 'tif';

export interface WatermarkSignatures {
  /** Matched case-insensitively as substrings of annotation, text-block and metadata text. */
  readonly keywords: readonly string[];
  /** Matched case-insensitively as substrings of annotation action URIs. */
  readonly domains: readonly string[];
}

export interface RemoverConfig {
  format: ExportFormat;
  dpi: number;
  output?: string;
  debug: boolean;
  signatures?: WatermarkSignatures;
  // Images at least this wide and tall (pixels) are treated as the scanned page itself
  mainContentThreshold?: number;
}

export type ResolvedRemoverConfig = Required<Omit<RemoverConfig, 'output'>> & Pick<RemoverConfig, 'output'>;

export interface RemoverProgress {
  stage: 'loading' | 'pruning' | 'exporting' | 'complete';
  message?: string;
  totalPages?: number;
}

export type ProgressCallback = (progress: RemoverProgress) => void;
