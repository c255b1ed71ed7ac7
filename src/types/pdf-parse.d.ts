// The package entry of pdf-parse reads a bundled test PDF when it thinks it
// is the main module, which is the case under ES module loaders. The parser
// itself lives in lib/pdf-parse.js and is typed here.
declare module "pdf-parse/lib/pdf-parse.js" {
  interface PdfParseOptions {
    /** Called once per page with the pdf.js page proxy; the result is appended to `text` */
    pagerender?: (pageData: unknown) => Promise<string> | string;
    /** Last page to render, 0 for all */
    max?: number;
  }

  interface PdfParseResult {
    numpages: number;
    numrender: number;
    info: Record<string, unknown>;
    text: string;
  }

  function pdfParse(data: Buffer | Uint8Array, options?: PdfParseOptions): Promise<PdfParseResult>;

  export = pdfParse;
}
