import { FormatError } from '../../errors';
import { extractionLogger } from '../../logger';

// Structural views of the parts of pdfjs-dist and @napi-rs/canvas used here.

interface PdfViewport {
  width: number;
  height: number;
}

interface PdfPage {
  getViewport(params: { scale: number }): PdfViewport;
  render(params: { canvasContext?: unknown; canvas?: unknown; viewport?: unknown }): { promise: Promise<void> };
  cleanup(): unknown;
}

interface PdfDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
  destroy(): Promise<void>;
}

export interface PdfJsLike {
  getDocument(source: {
    data: Uint8Array;
    isEvalSupported?: boolean;
    disableFontFace?: boolean;
    useSystemFonts?: boolean;
    verbosity?: number;
  }): { promise: Promise<PdfDocument>; destroy(): Promise<void> };
}

interface Canvas2DLike {
  fillStyle: unknown;
  fillRect(x: number, y: number, width: number, height: number): void;
  drawImage(image: unknown, dx: number, dy: number): void;
}

export interface CanvasLike {
  createCanvas(width: number, height: number): {
    getContext(contextType: '2d'): Canvas2DLike;
    toBuffer(mime: 'image/png'): Buffer;
  };
  loadImage(source: Buffer): Promise<{ width: number; height: number }>;
}

export interface RenderToolkit {
  pdfjs: PdfJsLike;
  canvas: CanvasLike;
}

export type RenderToolkitLoader = () => Promise<RenderToolkit>;

export interface RenderedPage {
  png: Buffer;
  pageCount: number;
  width: number;
  height: number;
}

function isCanvasLike(value: unknown): value is CanvasLike {
  return typeof value === 'object' && value !== null &&
    'createCanvas' in value && typeof value.createCanvas === 'function' &&
    'loadImage' in value && typeof value.loadImage === 'function';
}

// @napi-rs/canvas is CommonJS; its named exports may only be reachable through `default`.
function canvasExports(loaded: object): CanvasLike {
  if (isCanvasLike(loaded)) return loaded;
  const interop: unknown = Reflect.get(loaded, 'default');
  if (isCanvasLike(interop)) return interop;
  throw new Error('@napi-rs/canvas does not expose createCanvas and loadImage');
}

export const loadRenderToolkit: RenderToolkitLoader = async () => {
  const [pdfjs, canvas] = await Promise.all([
    import('pdfjs-dist/legacy/build/pdf.mjs'),
    import('@napi-rs/canvas'),
  ]);
  return { pdfjs, canvas: canvasExports(canvas) };
};

export async function resolveToolkit(loader: RenderToolkitLoader): Promise<RenderToolkit> {
  try {
    return await loader();
  } catch (error) {
    extractionLogger.error({ err: error }, 'Page rendering libraries could not be loaded');
    throw new FormatError(
      'CONVERSION_TOOL_UNAVAILABLE',
      'Document rendering is not available on this server; install pdfjs-dist and @napi-rs/canvas'
    );
  }
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

export interface RenderOptions {
  scale: number;
  /** The longest rendered edge never exceeds this, whatever the page size. */
  maxEdge: number;
}

export function effectiveScale(page: PdfViewport, options: RenderOptions): number {
  const longest = Math.max(page.width, page.height);
  if (longest <= 0) return options.scale;
  return Math.min(options.scale, options.maxEdge / longest);
}

/** Renders page 1 only. Later pages are never decoded. */
export async function renderFirstPage(
  toolkit: RenderToolkit,
  bytes: Buffer,
  options: RenderOptions
): Promise<RenderedPage> {
  const loadingTask = toolkit.pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    verbosity: 0,
  });

  let document: PdfDocument;
  try {
    document = await loadingTask.promise;
  } catch (error) {
    if (errorName(error) === 'PasswordException') {
      throw new FormatError('PASSWORD_PROTECTED', 'The PDF is encrypted and needs a password to open', 'pdf');
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError('CORRUPT_INPUT', `The PDF could not be read: ${reason}`, 'pdf');
  }

  try {
    if (document.numPages < 1) {
      throw new FormatError('CORRUPT_INPUT', 'The PDF has no pages', 'pdf');
    }

    const page = await document.getPage(1);
    const scale = effectiveScale(page.getViewport({ scale: 1 }), options);
    const viewport = page.getViewport({ scale });
    const width = Math.min(Math.ceil(viewport.width), options.maxEdge);
    const height = Math.min(Math.ceil(viewport.height), options.maxEdge);

    const canvas = toolkit.canvas.createCanvas(width, height);
    const context = canvas.getContext('2d');
    context.fillStyle = '#ffffff';
    context.fillRect(0, 0, width, height);

    await page.render({ canvasContext: context, canvas, viewport }).promise;
    page.cleanup();

    return { png: canvas.toBuffer('image/png'), pageCount: document.numPages, width, height };
  } catch (error) {
    if (error instanceof FormatError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError('CORRUPT_INPUT', `Page 1 could not be rendered: ${reason}`, 'pdf');
  } finally {
    await document.destroy();
  }
}

/**
 * Decodes formats sharp cannot read (BMP) into PNG through the canvas codec.
 * Callers pass only bitmaps that inspectBitmap accepted.
 */
export async function decodeWithCanvas(toolkit: RenderToolkit, bytes: Buffer): Promise<Buffer> {
  let image: { width: number; height: number };
  try {
    image = await toolkit.canvas.loadImage(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError('CORRUPT_INPUT', `The bitmap could not be decoded: ${reason}`, 'bmp');
  }
  const canvas = toolkit.canvas.createCanvas(image.width, image.height);
  canvas.getContext('2d').drawImage(image, 0, 0);
  return canvas.toBuffer('image/png');
}
