export type LayoutHint = 'thumbnail' | 'framed' | 'frameless';

/**
 * One image placement as reported by the renderer, before width estimation.
 */
export interface RawPlacement {
  imageId: string;         // Normalized file key, e.g. "Sunset_over_the_bay.jpg"
  width?: number;          // Explicit display width, if the author gave one
  height?: number;         // Explicit display height
  layout: LayoutHint[];
  fullWidth: number;       // Intrinsic dimensions of the file
  fullHeight: number;
}

export interface ImageUsageRecord {
  imageId: string;
  declaredWidth: number;   // Explicit or estimated display width
  declaredHeight?: number;
  layout: LayoutHint[];
  fullWidth: number;
  fullHeight: number;
  ordinal: number;         // 0-based position among all usages on the document
}

/**
 * The document being rendered, as identified by the renderer.
 */
export interface DocumentRef {
  id: number;
  namespace: number;
  title?: string;
}

export interface DocumentImageState {
  documentId: number;
  records: ImageUsageRecord[];
}
