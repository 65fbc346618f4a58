export { classify, isPictographic, isCjkIdeograph, isCjkPunctuation, CJK_PUNCTUATION } from './classify.js';
export { segment } from './segment.js';
export {
  createTextMeasurer,
  widthOf,
  advanceOf,
  pictographicScale,
  pictographicTargetSize,
  compaction,
} from './metrics.js';
export type { TextBackend, TextMeasurer } from './metrics.js';
export { wrap, nextLine, findBreakPoint, truncateWithEllipsis, ELLIPSIS } from './wrap.js';
export type { WrapState } from './wrap.js';
export { iconShapes, starVertices, drawIcon } from './icons.js';
export type { IconShape, Point } from './icons.js';
export { layoutCard, formatNumber, CARD_WIDTH, CARD_HEIGHT } from './layout.js';
export type { CardLayout, TextPiece, StatLayout } from './layout.js';
export { renderCard, encodePng, createCanvasBackend, flattenToRgb } from './renderer.js';
export { resolveFont, loadCardFonts, BODY_FONT_CANDIDATES, BOLD_FONT_CANDIDATES, EMOJI_FONT_CANDIDATES } from './fonts.js';
export { decodeAvatar } from './avatar.js';
export { loadConfig } from './config.js';
export { parseRepoUrl, parseLastPage, toCardModel, readRepoResponse, fetchRepoCard, sanitizeFilename, cardPath } from './github.js';
export { CardRenderError, FontUnavailableError, InvalidLayoutError } from './errors.js';
export type * from './types.js';
