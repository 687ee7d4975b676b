/**
 * Unit tests for reading tabular input
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as XLSX from 'xlsx';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseDelimitedText, parseWorkbook, readTabularFile } from '../src/services/tabular';
import { EmptyInputError, ParseError } from '../src/errors';

describe('Row Model', () => {
  describe('parseDelimitedText', () => {
    it('should yield one row per record with every header in order', () => {
      const data = parseDelimitedText('Address,Name,Phone\n1 Main St,Bob,555\n2 Elm St,Alice,\n');

      expect(data.headers).toEqual(['Address', 'Name', 'Phone']);
      expect(data.rows).toHaveLength(2);
      for (const row of data.rows) {
        expect(Array.from(row.keys())).toEqual(['Address', 'Name', 'Phone']);
      }
      expect(data.rows[0].get('Name')).toBe('Bob');
      expect(data.rows[1].get('Phone')).toBe('');
    });

    it('should keep commas inside quoted fields', () => {
      const data = parseDelimitedText('Address,Name\n"1 Main St, City",Bob\n');
      expect(data.rows[0].get('Address')).toBe('1 Main St, City');
      expect(data.rows[0].get('Name')).toBe('Bob');
    });

    it('should keep numeric-looking cells as written', () => {
      const data = parseDelimitedText('Lat,Lon\n10.0,20.0\n');
      expect(data.rows[0].get('Lat')).toBe('10.0');
      expect(data.rows[0].get('Lon')).toBe('20.0');
    });

    it('should give empty strings for missing cells', () => {
      const data = parseDelimitedText('Address,Name\n,Alice\n');
      expect(data.rows[0].get('Address')).toBe('');
      expect(data.rows[0].get('Name')).toBe('Alice');
    });

    it('should skip blank lines', () => {
      const data = parseDelimitedText('A,B\n1,2\n\n3,4\n');
      expect(data.rows).toHaveLength(2);
      expect(data.rows[1].get('A')).toBe('3');
    });

    it('should keep rows whose cells are all empty', () => {
      const data = parseDelimitedText('Address,Name\n,\n1 Main,Bob\n');

      expect(data.rows).toHaveLength(2);
      expect(data.rows[0].get('Address')).toBe('');
      expect(data.rows[0].get('Name')).toBe('');
      expect(data.rows[1].get('Name')).toBe('Bob');
    });

    it('should count every empty-celled row while dropping empty lines', () => {
      const data = parseDelimitedText('Address,Name\r\n,\r\n\r\n,\r\n1 Main,Bob\r\n');
      expect(data.rows).toHaveLength(3);
    });

    it('should treat a quote inside a field as a literal character', () => {
      const data = parseDelimitedText('Address,Name\nfoo;"bar,Bob\n');

      expect(data.rows).toHaveLength(1);
      expect(data.rows[0].get('Address')).toBe('foo;"bar');
      expect(data.rows[0].get('Name')).toBe('Bob');
    });

    it('should detect semicolon-separated text', () => {
      const data = parseDelimitedText('Address;Name\n"1 Main St; City";Bob\n');

      expect(data.headers).toEqual(['Address', 'Name']);
      expect(data.rows[0].get('Address')).toBe('1 Main St; City');
    });

    it('should report an unclosed quote after the detected separator only', () => {
      expect(() => parseDelimitedText('Address;Name\nfoo;"bar\n')).toThrow(
        'Unterminated quoted field starting on line 2'
      );
    });

    it('should reject text the delimited reader does not recognise', () => {
      expect(() => parseDelimitedText('<Address>,Name\n1 Main St,Bob\n')).toThrow(
        'Could not parse input as delimited text'
      );
    });

    it('should ignore a byte-order mark', () => {
      const data = parseDelimitedText('\uFEFFAddress,Name\nx,y\n');
      expect(data.headers).toEqual(['Address', 'Name']);
    });

    it('should reject an unterminated quoted field', () => {
      expect(() => parseDelimitedText('Address,Name\n"1 Main St,Bob\n')).toThrow(ParseError);
      expect(() => parseDelimitedText('Address,Name\n"1 Main St,Bob\n')).toThrow(
        'Unterminated quoted field starting on line 2'
      );
    });

    it('should accept escaped quotes inside a quoted field', () => {
      const data = parseDelimitedText('Address,Name\n"The ""Old"" Mill",Bob\n');
      expect(data.rows[0].get('Address')).toBe('The "Old" Mill');
    });

    it('should reject duplicate header names', () => {
      expect(() => parseDelimitedText('Name,Name\na,b\n')).toThrow(
        "Duplicate column name 'Name' in header"
      );
    });

    it('should reject rows with more fields than the header', () => {
      expect(() => parseDelimitedText('A,B\n1,2,3\n')).toThrow(ParseError);
    });

    it('should report a header without data rows as empty input', () => {
      expect(() => parseDelimitedText('Address,Name\n')).toThrow(EmptyInputError);
    });

    it('should report blank text as empty input', () => {
      expect(() => parseDelimitedText('  \n')).toThrow(EmptyInputError);
    });
  });

  describe('parseWorkbook', () => {
    it('should read the first sheet as text cells', () => {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(
        workbook,
        XLSX.utils.aoa_to_sheet([
          ['Name', 'Lat', 'Lon'],
          ['X', 10.5, -3],
        ]),
        'Points'
      );

      const data = parseWorkbook(workbook);
      expect(data.headers).toEqual(['Name', 'Lat', 'Lon']);
      expect(data.rows[0].get('Lat')).toBe('10.5');
      expect(data.rows[0].get('Lon')).toBe('-3');
    });

    it('should fail on a workbook without sheets', () => {
      expect(() => parseWorkbook(XLSX.utils.book_new())).toThrow('Workbook contains no sheets');
    });
  });

  describe('readTabularFile', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('should read a delimited file from disk', async () => {
      dir = await mkdtemp(join(tmpdir(), 'tabular-'));
      const file = join(dir, 'places.csv');
      await writeFile(file, 'Address,Name\n12 Harbour Rd,Zoe\n', 'utf8');

      const data = await readTabularFile(file);
      expect(data.rows[0].get('Address')).toBe('12 Harbour Rd');
      expect(data.rows[0].get('Name')).toBe('Zoe');
    });

    it('should turn an unreadable file into a ParseError', async () => {
      await expect(readTabularFile(join(tmpdir(), 'does-not-exist-4711.csv'))).rejects.toThrow(ParseError);
    });
  });
});
