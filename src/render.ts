import chalk, { type ChalkInstance } from 'chalk';
import { makeCastlingRights } from './castling.js';
import { Position } from './chess.js';
import { makePiece } from './fen.js';
import { FILE_NAMES } from './types.js';
import { isLightSquare } from './util.js';

export interface RenderOptions {
  /** Draw from black's side: rank 1 on top, files from h to a. */
  flipped?: boolean;
  /** Shades light squares. Defaults to the global chalk instance. */
  chalk?: ChalkInstance;
}

const TOP = '   ╔════════════════════════╗';
const BOTTOM = '   ╚════════════════════════╝';

/**
 * Draws `pos` as text: a header with the side to move and castling rights,
 * eight labelled rows framed in a box, and a footer with the file letters.
 * Light squares get a white background, pieces on them black letters.
 */
export const renderBoard = (pos: Position, opts: RenderOptions = {}): string => {
  const shade = opts.chalk ?? chalk;
  const flipped = opts.flipped ?? false;
  const ranks = flipped ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];
  const files = flipped ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  const rights =
    makeCastlingRights(pos.castlingRights('white')).toUpperCase() + makeCastlingRights(pos.castlingRights('black'));
  const lines = [`   ${pos.turn}  ${rights || '-'}`, TOP];
  for (const rank of ranks) {
    let row = `${rank + 1}  ║`;
    for (const file of files) {
      const square = file + 8 * rank;
      const piece = pos.get(square);
      const cell = piece ? ` ${makePiece(piece)} ` : '   ';
      if (!isLightSquare(square)) row += cell;
      else row += piece ? shade.black.bgWhite(cell) : shade.bgWhite(cell);
    }
    lines.push(row + '║');
  }
  lines.push(BOTTOM, '     ' + files.map(file => FILE_NAMES[file]).join('  '));
  return lines.join('\n') + '\n';
};
