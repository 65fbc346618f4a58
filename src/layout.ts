import { createTextMeasurer, withBodyStyle } from './metrics.js';
import type { TextBackend } from './metrics.js';
import { truncateWithEllipsis, wrap } from './wrap.js';
import type { CardFonts, CardModel, FontPair, IconKind, LayoutBox } from './types.js';

// Card geometry (px)
export const CARD_WIDTH = 900;
export const CARD_HEIGHT = 450;
export const BACKGROUND = '#f6f8fa';

const CONTENT_LEFT = 60;
const CONTENT_RIGHT_MARGIN = 40;

const AVATAR_SIZE = 140;
const AVATAR_X = CARD_WIDTH - 200;
const AVATAR_Y = 50;
export const AVATAR_PLACEHOLDER = '#d0d7de';

const TITLE_Y = 60;
const TITLE_LINE_HEIGHT = 55;
const OWNER_SIZE = 48;
const REPO_SIZE = 52;
/** Repo name is larger than the owner; raise it so the baselines line up. */
const REPO_RAISE_SINGLE_LINE = 8;
const REPO_RAISE_OWN_LINE = 2;

const SECTION_GAP = 10;
const DESCRIPTION_SIZE = 24;
const DESCRIPTION_LINE_HEIGHT = 30;
const DESCRIPTION_MAX_LINES = 3;

const STATS_BASE_Y = CARD_HEIGHT - 100;
const STAT_NUMBER_SIZE = 26;
const STAT_LABEL_SIZE = 15;
const ICON_SIZE = 20;
const ICON_DROP = 8;
const ICON_TEXT_GAP = 10;

const COLOR_BAR_HEIGHT = 12;
export const COLOR_BAR_PALETTE = ['#ea4335', '#fbbc04', '#34a853', '#4285f4'];

export const COLORS = {
  muted: '#656d76',
  strong: '#1f2328',
  icon: '#57606a',
} as const;

/** Offsets each string is drawn at; more than one thickens the strokes. */
export type StrokeOffsets = ReadonlyArray<readonly [number, number]>;

const PLAIN: StrokeOffsets = [[0, 0]];
const TITLE_BOLD: StrokeOffsets = [[0, 0], [1, 0], [0, 1], [1, 1]];
const NUMBER_BOLD: StrokeOffsets = [[0, 0], [1, 0]];

/** A string placed on the card. (x, y) is the top-left text origin. */
export interface TextPiece {
  text: string;
  x: number;
  y: number;
  fonts: FontPair;
  color: string;
  offsets: StrokeOffsets;
}

export interface StatLayout {
  iconKind: IconKind;
  iconX: number;
  iconY: number;
  iconSize: number;
  iconColor: string;
  number: TextPiece;
  label: TextPiece;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CardLayout {
  width: number;
  height: number;
  background: string;
  avatar: Rect;
  title: TextPiece[];
  titleEndY: number;
  /** Null when the model has no description */
  description: { box: LayoutBox; lines: TextPiece[] } | null;
  stats: StatLayout[];
  colorBar: Array<Rect & { color: string }>;
}

/**
 * One decimal place, exact ties to the even digit. toFixed already rounds
 * the exact binary value, so only true ties (odd multiples of 0.25) differ.
 */
function toTenthsHalfEven(x: number): string {
  const quarters = x * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const tenths = Math.floor(x * 10);
    return ((tenths % 2 === 0 ? tenths : tenths + 1) / 10).toFixed(1);
  }
  return x.toFixed(1);
}

/** 950 -> "950", 1500 -> "1.5k", 1250 -> "1.2k" */
export function formatNumber(value: number): string {
  if (value >= 1000) return `${toTenthsHalfEven(value / 1000)}k`;
  return String(value);
}

function piece(text: string, x: number, y: number, fonts: FontPair, color: string, offsets = PLAIN): TextPiece {
  return { text, x, y, fonts, color, offsets };
}

/**
 * owner/repo on one line when it fits the space left of the avatar,
 * otherwise "owner/" with the (possibly truncated) repo name below.
 */
function layoutTitle(
  model: CardModel,
  fonts: CardFonts,
  backend: TextBackend,
  maxWidth: number,
): { pieces: TextPiece[]; endY: number } {
  const ownerFonts = withBodyStyle({ body: fonts.body, pictographic: fonts.pictographic }, OWNER_SIZE, 'normal');
  const repoFonts = withBodyStyle({ body: fonts.bold, pictographic: fonts.pictographic }, REPO_SIZE, 'bold');
  const owner = createTextMeasurer(backend, ownerFonts);
  const repo = createTextMeasurer(backend, repoFonts);

  const ownerText = model.ownerName;
  const slashText = '/';
  const repoText = model.repoName;

  const repoWidth = repo.measure(repoText);
  const totalWidth = owner.measure(ownerText) + owner.measure(slashText) + repoWidth;

  const x = CONTENT_LEFT;
  const y = TITLE_Y;
  const slashX = x + owner.advance(ownerText);
  const head = [
    piece(ownerText, x, y, ownerFonts, COLORS.muted),
    piece(slashText, slashX, y, ownerFonts, COLORS.muted),
  ];

  if (totalWidth <= maxWidth) {
    const repoX = slashX + owner.advance(slashText);
    return {
      pieces: [...head, piece(repoText, repoX, y - REPO_RAISE_SINGLE_LINE, repoFonts, COLORS.strong, TITLE_BOLD)],
      endY: y + TITLE_LINE_HEIGHT,
    };
  }

  const nextY = y + TITLE_LINE_HEIGHT;
  const shown = repoWidth > maxWidth ? truncateWithEllipsis(repoText, maxWidth, repo) : repoText;
  return {
    pieces: [...head, piece(shown, x, nextY - REPO_RAISE_OWN_LINE, repoFonts, COLORS.strong, TITLE_BOLD)],
    endY: nextY + TITLE_LINE_HEIGHT,
  };
}

function layoutStats(model: CardModel, fonts: CardFonts, backend: TextBackend): StatLayout[] {
  if (model.stats.length === 0) return [];

  const numberFonts = withBodyStyle({ body: fonts.bold, pictographic: fonts.pictographic }, STAT_NUMBER_SIZE, 'bold');
  const labelFonts = withBodyStyle({ body: fonts.body, pictographic: fonts.pictographic }, STAT_LABEL_SIZE, 'normal');
  const numbers = createTextMeasurer(backend, numberFonts);

  const sectionWidth = (CARD_WIDTH - CONTENT_LEFT * 2) / model.stats.length;
  // Labels sit below the tallest digits the number font draws
  const numberHeight = numbers.extent('123').height;
  const labelY = STATS_BASE_Y + numberHeight + ICON_TEXT_GAP;

  return model.stats.map((stat, i) => {
    const x = CONTENT_LEFT + Math.trunc(i * sectionWidth);
    return {
      iconKind: stat.iconKind,
      iconX: x,
      iconY: STATS_BASE_Y + ICON_DROP,
      iconSize: ICON_SIZE,
      iconColor: COLORS.icon,
      number: piece(formatNumber(stat.value), x + ICON_SIZE + ICON_TEXT_GAP, STATS_BASE_Y, numberFonts, COLORS.strong, NUMBER_BOLD),
      label: piece(stat.label, x, labelY, labelFonts, COLORS.muted),
    };
  });
}

function layoutColorBar(): Array<Rect & { color: string }> {
  const segmentWidth = CARD_WIDTH / COLOR_BAR_PALETTE.length;
  return COLOR_BAR_PALETTE.map((color, i) => {
    const start = Math.trunc(i * segmentWidth);
    const end = Math.trunc((i + 1) * segmentWidth);
    return { x: start, y: CARD_HEIGHT - COLOR_BAR_HEIGHT, width: end - start, height: COLOR_BAR_HEIGHT, color };
  });
}

/**
 * Place every element of the card. Pure: measures through `backend` and
 * returns positions; painting happens in renderer.ts.
 */
export function layoutCard(model: CardModel, fonts: CardFonts, backend: TextBackend): CardLayout {
  const avatar: Rect = { x: AVATAR_X, y: AVATAR_Y, width: AVATAR_SIZE, height: AVATAR_SIZE };

  const maxTitleWidth = AVATAR_X - CONTENT_LEFT - CONTENT_RIGHT_MARGIN;
  const title = layoutTitle(model, fonts, backend, maxTitleWidth);

  let description: CardLayout['description'] = null;
  if (model.description) {
    const startY = Math.max(title.endY + SECTION_GAP, avatar.y + avatar.height + SECTION_GAP);
    const box: LayoutBox = {
      originX: CONTENT_LEFT,
      originY: startY,
      maxWidth: CARD_WIDTH - CONTENT_LEFT - CONTENT_RIGHT_MARGIN,
      maxLines: DESCRIPTION_MAX_LINES,
    };
    const descFonts = withBodyStyle({ body: fonts.body, pictographic: fonts.pictographic }, DESCRIPTION_SIZE, 'normal');
    const lines = wrap(model.description, box, createTextMeasurer(backend, descFonts));
    description = {
      box,
      lines: lines.map((line, i) =>
        piece(line, box.originX, box.originY + i * DESCRIPTION_LINE_HEIGHT, descFonts, COLORS.muted),
      ),
    };
  }

  return {
    width: CARD_WIDTH,
    height: CARD_HEIGHT,
    background: BACKGROUND,
    avatar,
    title: title.pieces,
    titleEndY: title.endY,
    description,
    stats: layoutStats(model, fonts, backend),
    colorBar: layoutColorBar(),
  };
}
