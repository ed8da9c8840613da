export interface AudioAsset {
  id: string;
  fileName: string;
  localPath: string;
  publicUrl: string;
}

export interface SaveAudioInput {
  data: Buffer;
  contentType?: string;
  extension?: string;
  /** Prefix for the file name, sanitized. */
  label?: string;
}
