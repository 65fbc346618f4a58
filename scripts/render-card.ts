/**
 * render-card.ts
 *
 * Renders a 900x450 summary card for one repository and writes it as PNG.
 *
 * Usage:
 *   npx tsx scripts/render-card.ts acme/widget
 *   npx tsx scripts/render-card.ts https://github.com/acme/widget --out card.png
 *   npx tsx scripts/render-card.ts acme/widget --model model.json --avatar avatar.png
 *
 * --model renders offline from a JSON file shaped like CardModel (without
 * avatarBitmap); --avatar supplies the avatar image bytes from disk.
 *
 * Env vars (or .env in the working directory): CARD_BODY_FONT, CARD_BOLD_FONT,
 * CARD_EMOJI_FONT, CARD_EMOJI_NATIVE_SIZE, CARD_OUTPUT_DIR, GITHUB_TOKEN
 */

import fs from 'node:fs';
import path from 'node:path';
import { config } from 'dotenv';
import { decodeAvatar } from '../src/avatar.js';
import { loadConfig } from '../src/config.js';
import { loadCardFonts } from '../src/fonts.js';
import { cardPath, fetchRepoCard, parseRepoUrl } from '../src/github.js';
import type { RepoRef } from '../src/github.js';
import { encodePng, renderCard } from '../src/renderer.js';
import type { CardModel, IconKind, StatEntry } from '../src/types.js';

config();

interface Args {
  repo: string | null;
  model: string | null;
  avatar: string | null;
  out: string | null;
}

function parseArgs(argv: string[]): Args {
  const args: Args = { repo: null, model: null, avatar: null, out: null };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--model' && argv[i + 1]) {
      args.model = argv[++i] ?? null;
    } else if (arg === '--avatar' && argv[i + 1]) {
      args.avatar = argv[++i] ?? null;
    } else if (arg === '--out' && argv[i + 1]) {
      args.out = argv[++i] ?? null;
    } else if (arg && !arg.startsWith('--')) {
      args.repo = arg;
    }
  }
  return args;
}

const ICON_KINDS: readonly IconKind[] = ['contributors', 'issues', 'fork', 'star'];

function isIconKind(value: unknown): value is IconKind {
  return ICON_KINDS.some(kind => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStat(raw: unknown): StatEntry {
  if (!isRecord(raw)) throw new Error('stat entry must be an object');
  const { value, label, iconKind } = raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`stat value must be a non-negative integer, got ${String(value)}`);
  }
  if (typeof label !== 'string') throw new Error('stat label must be a string');
  if (!isIconKind(iconKind)) throw new Error(`unknown icon kind: ${String(iconKind)}`);
  return { value, label, iconKind };
}

/** Load a CardModel (minus the avatar) from a JSON file. */
function readModelFile(file: string, ref: RepoRef): CardModel {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isRecord(raw)) throw new Error(`${file}: expected a JSON object`);
  const obj = raw;
  const stats = Array.isArray(obj.stats) ? obj.stats.map(readStat) : [];
  return {
    ownerName: typeof obj.ownerName === 'string' ? obj.ownerName : ref.owner,
    repoName: typeof obj.repoName === 'string' ? obj.repoName : ref.repo,
    description: typeof obj.description === 'string' ? obj.description : null,
    avatarBitmap: null,
    stats,
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.repo) {
    console.error('Usage: npx tsx scripts/render-card.ts <owner/repo | URL> [--model file] [--avatar file] [--out file]');
    process.exit(1);
  }

  const settings = loadConfig();
  const ref = parseRepoUrl(args.repo);
  console.log(`\n=== ${ref.owner}/${ref.repo} ===`);

  let model: CardModel | null;
  if (args.model) {
    model = readModelFile(args.model, ref);
  } else {
    console.log('  [github] fetching repository data...');
    model = await fetchRepoCard(ref, settings.githubToken);
  }
  if (!model) {
    console.error('  [card] no repository data, nothing rendered');
    process.exit(1);
  }

  if (args.avatar) {
    model = { ...model, avatarBitmap: await decodeAvatar(fs.readFileSync(args.avatar)) };
  }

  const fonts = loadCardFonts(settings);
  const card = renderCard(model, fonts.body, fonts.pictographic, fonts.bold);
  const png = await encodePng(card);

  const outputPath = args.out ?? cardPath(settings.outputDir, ref);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, png);
  console.log(`  [card] wrote ${outputPath} (${card.width}x${card.height}, ${png.length} bytes)`);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
