// Spoken piece names in Turkish and English, checked in this order
const PIECE_WORDS: ReadonlyArray<[string, string]> = [
  ['at', 'N'], ['knight', 'N'],
  ['fil', 'B'], ['bishop', 'B'],
  ['kale', 'R'], ['rook', 'R'],
  ['vezir', 'Q'], ['queen', 'Q'],
  ['sah', 'K'], ['king', 'K']
];

const TURKISH_FOLD: Record<string, string> = {
  'ş': 's', 'ı': 'i', 'ğ': 'g', 'ü': 'u', 'ö': 'o', 'ç': 'c'
};

const SQUARE = /^[a-h][1-8]$/;
const COORDINATE_MOVE = /^[a-h][1-8][a-h][1-8]$/;

export function normalizeTranscript(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[şığüöç]/g, ch => TURKISH_FOLD[ch] ?? ch);
}

/**
 * Best-guess move token for a speech transcript, or null when the words
 * don't name a move. Returns SAN ("Nf3", "O-O") or coordinates ("e2e4").
 */
export function transcriptToMove(transcript: string): string | null {
  let text = normalizeTranscript(transcript);

  if (['uzun rok', 'long castle', 'o-o-o'].some(p => text.includes(p))) return 'O-O-O';
  if (['kisa rok', 'short castle', 'o-o'].some(p => text.includes(p))) return 'O-O';

  let piece: string | undefined;
  for (const [word, letter] of PIECE_WORDS) {
    if (text.includes(word)) {
      piece = letter;
      text = text.split(word).join(' ');
      break;
    }
  }

  const squares: string[] = [];
  for (const word of text.split(/\s+/)) {
    const clean = word.replace(/[^a-z0-9]/g, '');
    if (SQUARE.test(clean)) {
      squares.push(clean);
    } else if (COORDINATE_MOVE.test(clean)) {
      return clean;
    }
  }

  if (squares.length === 1) {
    const [square] = squares;
    if (piece) return piece + square;
    // Pawn origin: ranks 3-4 come from rank 2, anything else from rank 7
    const fromRank = square[1] === '3' || square[1] === '4' ? '2' : '7';
    return square[0] + fromRank + square;
  }
  if (squares.length === 2) {
    return squares[0] + squares[1];
  }
  return null;
}
