export const IMAGE_MODES = ['none', 'separate', 'inline', 'zip'] as const;

export type ImageMode = (typeof IMAGE_MODES)[number];

export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'bmp', 'tiff', 'tif', 'webp'] as const;

export const CONVERTIBLE_EXTENSIONS = [
  'doc', 'docx', 'odt', 'rtf', 'txt', 'html', 'htm', 'pptx', 'ppt', 'odp', 'xlsx', 'xls', 'ods',
  'csv', 'epub',
] as const;

export type InputKind = 'pdf' | 'image' | 'convertible';

export type DocumentDescriptor =
  | { type: 'document_url'; documentUrl: string; documentName: string }
  | { type: 'image_url'; imageUrl: string };

export interface OcrImage {
  id: string;
  imageBase64?: string | null;
}

export interface OcrPage {
  index: number;
  markdown: string;
  images: OcrImage[];
}

export interface OcrResult {
  model: string;
  pages: OcrPage[];
  latencyMs: number;
}

export interface EncodedFile {
  base64: string;
  sizeBytes: number;
}

export interface OcrRunOptions {
  inputPath: string;
  model: string;
  includeImages: boolean;
  imageMode: ImageMode;
  outputPath: string;
}

export interface OcrRunResult {
  outputPath: string;
  pageCount: number;
}
