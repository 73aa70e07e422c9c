/**
 * ASCII Banner
 *
 * CLINIGRAPH block art inside a box, border characters in white and
 * block fill in gray.
 */

import { c, type ColorName, colorize, stripAnsi } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// ASCII Art
// ═══════════════════════════════════════════════════════════════════════════════

const ART = [
  ' ██████╗██╗     ██╗███╗   ██╗██╗ ██████╗ ██████╗  █████╗ ██████╗ ██╗  ██╗',
  '██╔════╝██║     ██║████╗  ██║██║██╔════╝ ██╔══██╗██╔══██╗██╔══██╗██║  ██║',
  '██║     ██║     ██║██╔██╗ ██║██║██║  ███╗██████╔╝███████║██████╔╝███████║',
  '██║     ██║     ██║██║╚██╗██║██║██║   ██║██╔══██╗██╔══██║██╔═══╝ ██╔══██║',
  '╚██████╗███████╗██║██║ ╚████║██║╚██████╔╝██║  ██║██║  ██║██║     ██║  ██║',
  ' ╚═════╝╚══════╝╚═╝╚═╝  ╚═══╝╚═╝ ╚═════╝ ╚═╝  ╚═╝╚═╝  ╚═╝╚═╝     ╚═╝  ╚═╝'
];

const TAGLINE = 'Patient records, knowledge graphs and risk models behind one agent';

// ═══════════════════════════════════════════════════════════════════════════════
// Banner Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const BOX = {
  topLeft: '╔',
  topRight: '╗',
  bottomLeft: '╚',
  bottomRight: '╝',
  horizontal: '═',
  vertical: '║'
} as const;

const BORDER_COLOR: ColorName = 'white';
const FILL_COLOR: ColorName = 'dim';

const BANNER_WIDTH = 80;
const CONTENT_WIDTH = BANNER_WIDTH - 4; // borders and padding

const FILL_CHARS = new Set(['█', '▀', '▄', '▌', '▐', '░', '▒', '▓']);

// ═══════════════════════════════════════════════════════════════════════════════
// Banner Generation
// ═══════════════════════════════════════════════════════════════════════════════

function centerText(text: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(text).length);
  const leftPad = Math.floor(padding / 2);
  return ' '.repeat(leftPad) + text + ' '.repeat(padding - leftPad);
}

function borderedLine(content: string): string {
  const edge = colorize(BOX.vertical, BORDER_COLOR);
  return `${edge} ${content} ${edge}`;
}

function horizontalBorder(left: string, right: string): string {
  return colorize(`${left}${BOX.horizontal.repeat(BANNER_WIDTH - 2)}${right}`, BORDER_COLOR);
}

/**
 * Color runs of fill characters gray and everything else white.
 */
function colorizeArtLine(line: string): string {
  let result = '';
  let run = '';
  let runIsFill = false;

  const flush = (): void => {
    if (run === '') return;
    result += run.trim() === '' ? run : colorize(run, runIsFill ? FILL_COLOR : BORDER_COLOR);
    run = '';
  };

  for (const char of line) {
    const isFill = FILL_CHARS.has(char);
    if (run !== '' && isFill !== runIsFill) flush();
    runIsFill = isFill;
    run += char;
  }
  flush();

  return result;
}

/**
 * Generate the complete banner.
 */
export function generateBanner(): string {
  const blank = borderedLine(' '.repeat(CONTENT_WIDTH));
  const lines = [horizontalBorder(BOX.topLeft, BOX.topRight), blank];

  for (const artLine of ART) {
    lines.push(borderedLine(centerText(colorizeArtLine(artLine), CONTENT_WIDTH)));
  }

  lines.push(blank);
  lines.push(borderedLine(c.dim(centerText(TAGLINE, CONTENT_WIDTH))));
  lines.push(blank);
  lines.push(horizontalBorder(BOX.bottomLeft, BOX.bottomRight));

  return lines.join('\n');
}

export function displayBanner(): void {
  console.log(generateBanner());
}
