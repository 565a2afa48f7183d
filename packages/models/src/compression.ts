export const COMPRESSION_ALGORITHMS = ['xpress4k', 'xpress8k', 'xpress16k', 'lzx'] as const;

export type CompressionAlgorithm = (typeof COMPRESSION_ALGORITHMS)[number];

export const DEFAULT_COMPRESSION_ALGORITHM: CompressionAlgorithm = 'xpress8k';

const ALGORITHM_LABELS: Record<CompressionAlgorithm, string> = {
  xpress4k: 'XPRESS 4K (Fast)',
  xpress8k: 'XPRESS 8K (Balanced)',
  xpress16k: 'XPRESS 16K (Better Ratio)',
  lzx: 'LZX (Maximum)'
};

export const algorithmLabel = (algorithm: CompressionAlgorithm): string => ALGORITHM_LABELS[algorithm];

export const isCompressionAlgorithm = (value: unknown): value is CompressionAlgorithm =>
  COMPRESSION_ALGORITHMS.some(algorithm => algorithm === value);

/** Per-tick snapshot reported by the backend while a compression runs. */
export interface CompressionProgress {
  gameName: string;
  filesTotal: number;
  filesProcessed: number;
  bytesOriginal: number;
  bytesCompressed: number;
  bytesSaved: number;
  estimatedTimeRemainingMs: number | null;
  isComplete: boolean;
}

export const progressFraction = (progress: CompressionProgress): number => {
  if (progress.filesTotal === 0) {
    return 0;
  }
  return progress.filesProcessed / progress.filesTotal;
};

export const progressPercent = (progress: CompressionProgress): number =>
  Math.trunc(Math.max(0, Math.min(100, progressFraction(progress) * 100)));
