/**
 * Scanner Tests
 * Token kinds, literals, positions and diagnostics
 */

import { describe, expect, it } from 'vitest';
import {
  ContractError,
  FileSet,
  isLiteral,
  isOperator,
  Scanner,
  TOKEN_TYPES,
  type TokenType,
} from '../../src/index.js';
import {
  describeErrors,
  kinds,
  scanAll,
  scanSource,
  toBytes,
} from '../helpers/scan.js';

// ============================================================
// TOKEN TABLE
// ============================================================

type TokenClass = 'special' | 'literal' | 'operator';

interface Element {
  readonly type: TokenType;
  readonly text: string;
  readonly kind: TokenClass;
}

const T = TOKEN_TYPES;

const ELEMENTS: readonly Element[] = [
  // Special tokens
  { type: T.COMMENT, text: '/* a comment */', kind: 'special' },
  { type: T.COMMENT, text: '// a comment \n', kind: 'special' },
  { type: T.COMMENT, text: '/*\r*/', kind: 'special' },
  { type: T.COMMENT, text: '//\r\n', kind: 'special' },

  // Identifiers and basic type literals
  { type: T.IDENT, text: 'foobar', kind: 'literal' },
  { type: T.IDENT, text: 'a۰۱۸', kind: 'literal' },
  { type: T.IDENT, text: 'foo६४', kind: 'literal' },
  { type: T.IDENT, text: 'bar９８７６', kind: 'literal' },
  { type: T.IDENT, text: 'ŝ', kind: 'literal' },
  { type: T.IDENT, text: 'ŝfoo', kind: 'literal' },
  { type: T.BOOL, text: 'true', kind: 'literal' },
  { type: T.BOOL, text: 'false', kind: 'literal' },
  { type: T.INT, text: '0', kind: 'literal' },
  { type: T.INT, text: '1', kind: 'literal' },
  { type: T.INT, text: '123456789012345678890', kind: 'literal' },
  { type: T.INT, text: '01234567', kind: 'literal' },
  { type: T.INT, text: '0xcafebabe', kind: 'literal' },
  { type: T.FLOAT, text: '0.', kind: 'literal' },
  { type: T.FLOAT, text: '.0', kind: 'literal' },
  { type: T.FLOAT, text: '3.14159265', kind: 'literal' },
  { type: T.FLOAT, text: '1e0', kind: 'literal' },
  { type: T.FLOAT, text: '1e+100', kind: 'literal' },
  { type: T.FLOAT, text: '1e-100', kind: 'literal' },
  { type: T.FLOAT, text: '2.71828e-1000', kind: 'literal' },
  { type: T.STRING, text: '""', kind: 'literal' },
  { type: T.STRING, text: '"a"', kind: 'literal' },
  { type: T.STRING, text: '"foobar"', kind: 'literal' },
  { type: T.STRING, text: '"${v}"', kind: 'literal' },
  { type: T.STRING, text: '"foo${v}bar"', kind: 'literal' },
  { type: T.RAW_STRING, text: "''", kind: 'literal' },
  { type: T.RAW_STRING, text: "'a'", kind: 'literal' },
  { type: T.RAW_STRING, text: "'foobar'", kind: 'literal' },
  { type: T.RAW_STRING, text: "'${v}'", kind: 'literal' },
  { type: T.RAW_STRING, text: "'foo${v}bar'", kind: 'literal' },

  // Operators and delimiters
  { type: T.ADD, text: '+', kind: 'operator' },
  { type: T.SUB, text: '-', kind: 'operator' },
  { type: T.MUL, text: '*', kind: 'operator' },
  { type: T.QUO, text: '/', kind: 'operator' },
  { type: T.REM, text: '%', kind: 'operator' },
  { type: T.AND, text: '&&', kind: 'operator' },
  { type: T.OR, text: '||', kind: 'operator' },
  { type: T.EQL, text: '==', kind: 'operator' },
  { type: T.LSS, text: '<', kind: 'operator' },
  { type: T.GTR, text: '>', kind: 'operator' },
  { type: T.ASSIGN, text: '=', kind: 'operator' },
  { type: T.NOT, text: '!', kind: 'operator' },
  { type: T.NEQ, text: '!=', kind: 'operator' },
  { type: T.LEQ, text: '<=', kind: 'operator' },
  { type: T.GEQ, text: '>=', kind: 'operator' },
  { type: T.LPAREN, text: '(', kind: 'operator' },
  { type: T.LBRACK, text: '[', kind: 'operator' },
  { type: T.LBRACE, text: '{', kind: 'operator' },
  { type: T.COMMA, text: ',', kind: 'operator' },
  { type: T.PERIOD, text: '.', kind: 'operator' },
  { type: T.RPAREN, text: ')', kind: 'operator' },
  { type: T.RBRACK, text: ']', kind: 'operator' },
  { type: T.RBRACE, text: '}', kind: 'operator' },
  { type: T.COLON, text: ':', kind: 'operator' },
];

const WHITESPACE = '  \t  \n\n\n';

function classOf(type: TokenType): TokenClass {
  if (isLiteral(type)) return 'literal';
  if (isOperator(type)) return 'operator';
  return 'special';
}

function newlines(s: string): number {
  return s.split('\n').length - 1;
}

function byteLength(s: string): number {
  return toBytes(s).length;
}

describe('Scanner', () => {
  describe('token table', () => {
    const source = ELEMENTS.map((e) => e.text + WHITESPACE).join('');
    const { fset, file, scanner, tokens, errors } = scanSource(source, '');

    it('scans every element followed by EOF', () => {
      expect(tokens.map((t) => t.type)).toEqual([
        ...ELEMENTS.map((e) => e.type),
        T.EOF,
      ]);
      expect(tokens.map((t) => classOf(t.type))).toEqual([
        ...ELEMENTS.map((e) => e.kind),
        'special',
      ]);
    });

    it('returns literals only for literal kinds', () => {
      ELEMENTS.forEach((element, i) => {
        const expected = element.kind === 'literal' ? element.text : '';
        expect(tokens[i]?.literal).toBe(expected);
      });
    });

    it('places every token at the start of its line', () => {
      let offset = 0;
      let line = 1;
      ELEMENTS.forEach((element, i) => {
        const token = tokens[i];
        expect(token && fset.position(token.pos)).toEqual({
          filename: '',
          offset: file.base + offset,
          line,
          column: 1,
        });
        offset += byteLength(element.text) + byteLength(WHITESPACE);
        line += newlines(element.text) + newlines(WHITESPACE);
      });
    });

    it('places EOF after the last newline', () => {
      const eof = tokens[tokens.length - 1];
      const size = byteLength(source);
      expect(eof && fset.position(eof.pos)).toEqual({
        filename: '',
        offset: file.base + size,
        line: newlines(source),
        column: 2,
      });
    });

    it('reports no errors', () => {
      expect(errors).toEqual([]);
      expect(scanner.errorCount).toBe(0);
    });
  });

  // ============================================================
  // LIFECYCLE
  // ============================================================

  describe('init', () => {
    it('rejects a source whose length differs from the file size', () => {
      const file = new FileSet().addFile('a.tf', -1, 3);
      const scanner = new Scanner();
      expect(() => scanner.init(file, toBytes('ab'))).toThrow(
        'file size (3) does not match src len (2)'
      );
    });

    it('rejects scan() before init()', () => {
      const scanner = new Scanner();
      expect(() => scanner.scan()).toThrow(ContractError);
      expect(() => scanner.scan()).toThrow(
        'scanner must be initialized with init() before scan()'
      );
    });

    it('can be reused for the same file', () => {
      const src = toBytes('a @\nb\n');
      const file = new FileSet().addFile('a.tf', -1, src.length);
      const scanner = new Scanner();

      scanner.init(file, src);
      const first = scanAll(scanner);
      expect(scanner.errorCount).toBe(1);
      expect(file.lineCount).toBe(2);

      scanner.init(file, src);
      expect(scanner.errorCount).toBe(0);
      expect(scanAll(scanner)).toEqual(first);
      expect(scanner.errorCount).toBe(1);
      expect(file.lineCount).toBe(2);
    });

    it('can be reused for another file', () => {
      const fset = new FileSet();
      const scanner = new Scanner();
      for (const text of ['x', 'y + 1']) {
        const src = toBytes(text);
        scanner.init(fset.addFile(`${text}.tf`, -1, src.length), src);
        scanAll(scanner);
      }
      const tokens = scanAll(scanner);
      expect(kinds(tokens)).toEqual(['EOF']);
      expect(fset.position(tokens[0]?.pos ?? 0)).toEqual({
        filename: 'y + 1.tf',
        offset: 8,
        line: 1,
        column: 6,
      });
    });

    it('keeps returning EOF at the end', () => {
      const { scanner } = scanSource('x');
      expect(scanner.scan().type).toBe(T.EOF);
      expect(scanner.scan()).toEqual({ pos: 2, type: T.EOF, literal: '' });
    });

    it('counts errors without a handler', () => {
      const src = toBytes('@ #');
      const scanner = new Scanner();
      scanner.init(new FileSet().addFile('', -1, src.length), src);
      expect(kinds(scanAll(scanner))).toEqual([
        'ILLEGAL @',
        'ILLEGAL #',
        'EOF',
      ]);
      expect(scanner.errorCount).toBe(2);
    });
  });

  // ============================================================
  // LINES AND POSITIONS
  // ============================================================

  describe('positions', () => {
    it('records line starts while scanning', () => {
      const { file } = scanSource('a\nbb\n\nc');
      expect(file.lineCount).toBe(4);
      expect(file.lineStart(2)).toBe(file.pos(2));
      expect(file.lineStart(4)).toBe(file.pos(6));
    });

    it('does not record a line after a final newline', () => {
      const { file } = scanSource('a\nb\n');
      expect(file.lineCount).toBe(2);
    });

    it('counts columns in bytes', () => {
      const { fset, tokens } = scanSource('ŝ x');
      const x = tokens[1];
      expect(x?.literal).toBe('x');
      expect(x && fset.position(x.pos).column).toBe(4);
    });

    it('resolves positions of two files scanned in turn', () => {
      const fset = new FileSet();
      const srcA = toBytes('x\ny');
      const srcB = toBytes('p\nq');
      const fileA = fset.addFile('a.tf', fset.base, srcA.length);
      const fileB = fset.addFile('b.tf', fset.base, srcB.length);
      const scannerA = new Scanner();
      const scannerB = new Scanner();
      scannerA.init(fileA, srcA);
      scannerB.init(fileB, srcB);

      const seen: string[] = [];
      for (let i = 0; i < 3; i++) {
        for (const scanner of [scannerA, scannerB]) {
          const token = scanner.scan();
          const { filename, line, column } = fset.position(token.pos);
          seen.push(`${filename}:${line}:${column} ${token.type}`);
        }
      }
      expect(seen).toEqual([
        'a.tf:1:1 IDENT',
        'b.tf:1:1 IDENT',
        'a.tf:2:1 IDENT',
        'b.tf:2:1 IDENT',
        'a.tf:2:2 EOF',
        'b.tf:2:2 EOF',
      ]);
      expect(fset.file(fileA.pos(2))).toBe(fileA);
      expect(fset.file(fileB.pos(2))).toBe(fileB);
    });

    it('puts tokens after a comment on the next line', () => {
      const { fset, tokens } = scanSource('// note\nvalue');
      expect(kinds(tokens)).toEqual(['COMMENT', 'IDENT value', 'EOF']);
      const value = tokens[1];
      expect(value && fset.position(value.pos)).toEqual({
        filename: 'test.tf',
        offset: 9,
        line: 2,
        column: 1,
      });
    });
  });

  // ============================================================
  // TOKENS
  // ============================================================

  describe('operators', () => {
    it('prefers two-character operators', () => {
      const { tokens } = scanSource('a<=b!=c>=d==e&&f||!g<h>i=j');
      expect(tokens.map((t) => t.type)).toEqual([
        T.IDENT,
        T.LEQ,
        T.IDENT,
        T.NEQ,
        T.IDENT,
        T.GEQ,
        T.IDENT,
        T.EQL,
        T.IDENT,
        T.AND,
        T.IDENT,
        T.OR,
        T.NOT,
        T.IDENT,
        T.LSS,
        T.IDENT,
        T.GTR,
        T.IDENT,
        T.ASSIGN,
        T.IDENT,
        T.EOF,
      ]);
    });

    it('reports a single & or | as illegal', () => {
      const { tokens, errors } = scanSource('a & b | c');
      expect(kinds(tokens)).toEqual([
        'IDENT a',
        'ILLEGAL &',
        'IDENT b',
        'ILLEGAL |',
        'IDENT c',
        'EOF',
      ]);
      expect(describeErrors(errors)).toEqual([
        "1:3: illegal character U+0026 '&'",
        "1:7: illegal character U+007C '|'",
      ]);
    });

    it('reports the error at the global offset in the named file', () => {
      const { errors } = scanSource('  @');
      expect(errors).toEqual([
        {
          pos: { filename: 'test.tf', offset: 3, line: 1, column: 3 },
          msg: "illegal character U+0040 '@'",
        },
      ]);
    });
  });

  describe('keywords and identifiers', () => {
    it('scans true and false as BOOL, other words as IDENT', () => {
      const { tokens } = scanSource('true false truth _x constructor');
      expect(kinds(tokens)).toEqual([
        'BOOL true',
        'BOOL false',
        'IDENT truth',
        'IDENT _x',
        'IDENT constructor',
        'EOF',
      ]);
    });
  });

  describe('comments', () => {
    it('returns COMMENT with an empty literal', () => {
      const { tokens } = scanSource('/* x */ // y');
      expect(tokens).toEqual([
        { pos: 1, type: T.COMMENT, literal: '' },
        { pos: 9, type: T.COMMENT, literal: '' },
        { pos: 13, type: T.EOF, literal: '' },
      ]);
    });

    it('runs an unterminated block comment to EOF without an error', () => {
      const { tokens, errors } = scanSource('a /* open\nstill');
      expect(kinds(tokens)).toEqual(['IDENT a', 'COMMENT', 'EOF']);
      expect(errors).toEqual([]);
    });

    it('scans a lone slash as QUO', () => {
      const { tokens } = scanSource('a / b');
      expect(kinds(tokens)).toEqual(['IDENT a', 'QUO', 'IDENT b', 'EOF']);
    });
  });

  describe('numbers', () => {
    it('scans 078 as INT with one octal error', () => {
      const { tokens, errors } = scanSource('078');
      expect(kinds(tokens)).toEqual(['INT 078', 'EOF']);
      expect(describeErrors(errors)).toEqual(['1:1: illegal octal number']);
    });

    it('scans 078. as FLOAT without errors', () => {
      const { tokens, errors } = scanSource('078.');
      expect(kinds(tokens)).toEqual(['FLOAT 078.', 'EOF']);
      expect(errors).toEqual([]);
    });

    it('scans 078e1 as FLOAT without errors', () => {
      const { tokens, errors } = scanSource('078e1');
      expect(kinds(tokens)).toEqual(['FLOAT 078e1', 'EOF']);
      expect(errors).toEqual([]);
    });

    it('scans 0x as INT with one hexadecimal error', () => {
      const { tokens, errors } = scanSource('0x');
      expect(kinds(tokens)).toEqual(['INT 0x', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        '1:1: illegal hexadecimal number',
      ]);
    });

    it('stops a hexadecimal literal at the first non-hex character', () => {
      const { tokens, errors } = scanSource('0XfF.5');
      expect(kinds(tokens)).toEqual(['INT 0XfF', 'FLOAT .5', 'EOF']);
      expect(errors).toEqual([]);
    });

    it('accepts an exponent without digits', () => {
      const { tokens, errors } = scanSource('1.5e');
      expect(kinds(tokens)).toEqual(['FLOAT 1.5e', 'EOF']);
      expect(errors).toEqual([]);
    });

    it('splits 1..2 into two floats', () => {
      const { tokens } = scanSource('1..2');
      expect(kinds(tokens)).toEqual(['FLOAT 1.', 'FLOAT .2', 'EOF']);
    });

    it('scans a number followed by a letter as two tokens', () => {
      const { tokens } = scanSource('12ab');
      expect(kinds(tokens)).toEqual(['INT 12', 'IDENT ab', 'EOF']);
    });
  });

  describe('strings', () => {
    it("scans '\\u0000' as one raw string without errors", () => {
      const source = "'\\u0000'";
      const { tokens, errors } = scanSource(source);
      expect(kinds(tokens)).toEqual([`RAW_STRING ${source}`, 'EOF']);
      expect(errors).toEqual([]);
    });

    it('accepts every simple escape and the own quote', () => {
      const double = '"\\a\\b\\f\\n\\r\\t\\v\\\\\\""';
      const single = "'it\\'s'";
      const { tokens, errors } = scanSource(`${double} ${single}`);
      expect(kinds(tokens)).toEqual([
        `STRING ${double}`,
        `RAW_STRING ${single}`,
        'EOF',
      ]);
      expect(errors).toEqual([]);
    });

    it('accepts numeric escapes in range', () => {
      const { errors } = scanSource(
        '"\\000\\377\\x41\\u00e9\\U0010FFFF\\uFFFF"'
      );
      expect(errors).toEqual([]);
    });

    it("rejects the other quote's escape", () => {
      const { tokens, errors } = scanSource('"a\\\'b"');
      expect(kinds(tokens)).toEqual(['STRING "a\\\'b"', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        '1:4: unknown escape sequence',
      ]);
    });

    it('reports an unknown escape at the escaped character', () => {
      const { tokens, errors } = scanSource('"\\q"');
      expect(kinds(tokens)).toEqual(['STRING "\\q"', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        '1:3: unknown escape sequence',
      ]);
    });

    it('reports a wrong digit in an escape', () => {
      const { tokens, errors } = scanSource('"\\x4g"');
      expect(kinds(tokens)).toEqual(['STRING "\\x4g"', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        "1:5: illegal character U+0067 'g' in escape sequence",
      ]);
    });

    it('leaves a control character in an escape unquoted', () => {
      const { errors } = scanSource('"\\u12\t4"');
      expect(describeErrors(errors)).toEqual([
        '1:6: illegal character U+0009 in escape sequence',
      ]);
    });

    it('rejects surrogate halves and values past the maximum', () => {
      const { errors } = scanSource("\"\\uD800\" '\\U00110000' \"\\400\"");
      expect(describeErrors(errors)).toEqual([
        '1:3: escape sequence is invalid Unicode code point',
        '1:12: escape sequence is invalid Unicode code point',
        '1:25: escape sequence is invalid Unicode code point',
      ]);
    });

    it('reports an escape cut off by EOF', () => {
      const { tokens, errors } = scanSource('"\\x4');
      expect(kinds(tokens)).toEqual(['STRING "\\x4', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        '1:5: escape sequence not terminated',
        '1:1: string literal not terminated',
      ]);
    });

    it('reports a backslash at EOF', () => {
      const { errors } = scanSource('"\\');
      expect(describeErrors(errors)).toEqual([
        '1:3: escape sequence not terminated',
        '1:1: string literal not terminated',
      ]);
    });

    it('ends an unterminated string at the newline', () => {
      const { fset, tokens, errors } = scanSource('x = "abc\ny');
      expect(kinds(tokens)).toEqual([
        'IDENT x',
        'ASSIGN',
        'STRING "abc',
        'IDENT y',
        'EOF',
      ]);
      expect(describeErrors(errors)).toEqual([
        '1:5: string literal not terminated',
      ]);
      const y = tokens[3];
      expect(y && fset.position(y.pos).line).toBe(2);
    });
  });

  // ============================================================
  // ENCODING ERRORS
  // ============================================================

  describe('encoding', () => {
    it('reports NUL once inside a string', () => {
      const { tokens, errors } = scanSource(
        new Uint8Array([0x22, 0x61, 0x00, 0x62, 0x22])
      );
      expect(kinds(tokens)).toEqual(['STRING "a\u0000b"', 'EOF']);
      expect(describeErrors(errors)).toEqual(['1:3: illegal character NUL']);
    });

    it('reports NUL outside a literal twice', () => {
      const { tokens, errors } = scanSource(
        new Uint8Array([0x61, 0x00, 0x62])
      );
      expect(kinds(tokens)).toEqual([
        'IDENT a',
        'ILLEGAL \u0000',
        'IDENT b',
        'EOF',
      ]);
      expect(describeErrors(errors)).toEqual([
        '1:2: illegal character NUL',
        '1:2: illegal character U+0000',
      ]);
    });

    it('reports an invalid UTF-8 byte', () => {
      const { tokens, errors } = scanSource(
        new Uint8Array([0x61, 0x20, 0xff, 0x20, 0x62])
      );
      expect(kinds(tokens)).toEqual([
        'IDENT a',
        'ILLEGAL \ufffd',
        'IDENT b',
        'EOF',
      ]);
      expect(describeErrors(errors)).toEqual([
        '1:3: illegal UTF-8 encoding',
        "1:3: illegal character U+FFFD '\ufffd'",
      ]);
    });

    it('skips a byte order mark at the start', () => {
      const { fset, tokens, errors } = scanSource('\ufeffx');
      expect(kinds(tokens)).toEqual(['IDENT x', 'EOF']);
      expect(errors).toEqual([]);
      const x = tokens[0];
      expect(x && fset.position(x.pos).column).toBe(4);
    });

    it('reports a byte order mark after the start once', () => {
      const { tokens, errors } = scanSource('x\ufeff');
      expect(kinds(tokens)).toEqual(['IDENT x', 'ILLEGAL \ufeff', 'EOF']);
      expect(describeErrors(errors)).toEqual([
        '1:2: illegal byte order mark',
      ]);
    });

    it('reports each repeated byte order mark after the first', () => {
      const { scanner, errors } = scanSource('\ufeff\ufeff\ufeff');
      expect(describeErrors(errors)).toEqual([
        '1:4: illegal byte order mark',
        '1:7: illegal byte order mark',
      ]);
      expect(scanner.errorCount).toBe(2);
    });
  });

  // ============================================================
  // ERROR COUNT
  // ============================================================

  describe('errorCount', () => {
    const inputs: ReadonlyArray<string | Uint8Array> = [
      '',
      '@\n@ @\n',
      '"\\x4',
      '0x 078 "\\q',
      '\ufeff\ufeff#',
      new Uint8Array([0x00, 0xc3, 0x28, 0xed, 0xa0, 0x80]),
    ];

    it('matches the number of handler calls', () => {
      for (const input of inputs) {
        const { scanner, errors } = scanSource(input);
        expect(scanner.errorCount).toBe(errors.length);
      }
    });
  });
});
