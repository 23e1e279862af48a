/** Ordered per-page text of one attachment. Empty strings are pages with no text layer. */
export interface ExtractedText {
  filename: string;
  pages: string[];
}

/** Subset of a pdf.js text item */
export interface PdfTextItem {
  str: string;
  transform: number[];
}

/** pdf.js marked-content marker; carries no text */
export interface PdfMarkedContent {
  type: string;
}

/** Subset of a pdf.js page proxy */
export interface PdfPage {
  getTextContent(): Promise<{ items: Array<PdfTextItem | PdfMarkedContent> }>;
}
