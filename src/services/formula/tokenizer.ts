import type { Token } from '@/types/formulaTypes';
import { FormulaSyntaxError } from './errors';



const isDigit = (ch: string | undefined) => ch !== undefined && ch >= '0' && ch <= '9';
const isIdentStart = (ch: string | undefined) => ch !== undefined && /[A-Za-z_]/.test(ch);
const isIdentPart = (ch: string | undefined) => ch !== undefined && /[A-Za-z0-9_]/.test(ch);

// longest first
const OPERATORS = ['**', '//', '<=', '>=', '==', '!=', '+', '-', '*', '/', '%', '<', '>', '^'] as const;

const PUNCTUATION: Record<string, Token['kind']> = {
   '(': 'lparen',
   ')': 'rparen',
   '[': 'lbracket',
   ']': 'rbracket',
   '{': 'lbrace',
   '}': 'rbrace',
   ',': 'comma',
   '.': 'dot',
   ':': 'colon',
};


const readNumber = (src: string, start: number): number => {
   let pos = start;
   while (isDigit(src[pos])) pos++;
   if (src[pos] === '.') {
      pos++;
      while (isDigit(src[pos])) pos++;
   }
   if (src[pos] === 'e' || src[pos] === 'E') {
      let p = pos + 1;
      if (src[p] === '+' || src[p] === '-') p++;
      if (!isDigit(src[p])) {
         throw new FormulaSyntaxError(`Invalid number at position ${start}: missing exponent digits`, start);
      }
      while (isDigit(src[p])) p++;
      pos = p;
   }
   return pos;
};


/**
 * Splits formula text into tokens. Excel's `^` comes out as `**`.
 */
export function tokenize(src: string): Token[] {
   const tokens: Token[] = [];
   let pos = 0;

   while (pos < src.length) {
      const ch = src[pos];

      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
         pos++;
         continue;
      }

      if (isDigit(ch) || (ch === '.' && isDigit(src[pos + 1]))) {
         const end = readNumber(src, pos);
         tokens.push({ kind: 'number', text: src.slice(pos, end), position: pos });
         pos = end;
         continue;
      }

      if (isIdentStart(ch)) {
         const start = pos;
         while (isIdentPart(src[pos])) pos++;
         tokens.push({ kind: 'identifier', text: src.slice(start, pos), position: start });
         continue;
      }

      // read whole so the parser can reject it by name
      if (ch === '"' || ch === "'") {
         const end = src.indexOf(ch, pos + 1);
         if (end < 0) throw new FormulaSyntaxError(`Unterminated string at position ${pos}`, pos);
         tokens.push({ kind: 'string', text: src.slice(pos, end + 1), position: pos });
         pos = end + 1;
         continue;
      }

      const op = OPERATORS.find((o) => src.startsWith(o, pos));
      if (op) {
         tokens.push({ kind: 'operator', text: op === '^' ? '**' : op, position: pos });
         pos += op.length;
         continue;
      }

      const punct = PUNCTUATION[ch];
      if (punct) {
         tokens.push({ kind: punct, text: ch, position: pos });
         pos++;
         continue;
      }

      throw new FormulaSyntaxError(`Unexpected character '${ch}' at position ${pos}`, pos);
   }

   tokens.push({ kind: 'eof', text: '', position: src.length });
   return tokens;
}
