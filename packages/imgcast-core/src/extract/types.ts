/** Archive formats with an extraction strategy */
export type ArchiveFormat = 'zip' | 'xz' | 'gzip';

export interface ExtractionSourceOptions {
  /** Member to read from a zip archive */
  memberName: string;

  /** Decompressed size for formats that do not record it (xz, gzip) */
  expectedSize?: number | null;
}

export interface ExtractImageOptions {
  /** Downloaded archive */
  archivePath: string;

  /** Destination image file; its basename is the zip member to extract */
  imagePath: string;

  /** Decompressed size expected by the catalog */
  expectedSize?: number | null;

  signal?: AbortSignal;
}
