import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatReport, prepFromCsv, prepFromText } from './prep.js';
import { EmptyInputError, InputNotFoundError, MissingColumnsError } from '../utils/errors.js';

describe('prepFromCsv', () => {
  let dir: string;
  let prefix: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gbif-prep-'));
    prefix = join(dir, 'run');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(name: string, content: string | Buffer): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  it('builds the search list and kingdom map from a CSV export', () => {
    const input = writeInput(
      'occurrences.csv',
      [
        'species,genus,kingdom',
        'Panthera leo,Panthera,Animalia',
        ',Quercus,Plantae',
        'Panthera leo,Panthera,Animalia',
        '',
      ].join('\n'),
    );

    const summary = prepFromCsv(input, prefix);

    expect(summary).toMatchObject({
      delimiter: ',',
      rowsRead: 3,
      uniqueSearchNames: 2,
      uniquePairs: 1,
      searchNames: ['Panthera leo', 'Quercus'],
      speciesSearchPath: `${prefix}_species_search.txt`,
      speciesKingdomPath: `${prefix}_species_kingdom.tsv`,
    });
    expect(readFileSync(summary.speciesSearchPath, 'utf-8')).toBe('Panthera leo\nQuercus\n');
    expect(readFileSync(summary.speciesKingdomPath, 'utf-8')).toBe('Panthera leo\tAnimalia\r\n');
  });

  it('reads a tab-separated download with a BOM, mixed-case headers and extra columns', () => {
    const input = writeInput(
      'simple.tsv',
      '\uFEFFgbifID\tKingdom\tGenus\tSpecies\n' +
        '1\tPlantae\tQuercus\tQuercus robur\n' +
        '2\tPlantae\tQuercus\t\n' +
        '3\tFungi\t\t\n',
    );

    const summary = prepFromCsv(input, prefix);

    expect(summary.delimiter).toBe('\t');
    expect(summary.rowsRead).toBe(3);
    expect(readFileSync(summary.speciesSearchPath, 'utf-8')).toBe('Quercus\nQuercus robur\n');
    expect(readFileSync(summary.speciesKingdomPath, 'utf-8')).toBe('Quercus robur\tPlantae\r\n');
  });

  it('produces byte-identical files on a second run', () => {
    const input = writeInput(
      'occurrences.csv',
      'species,genus,kingdom\nZea mays,Zea,Plantae\nCanis lupus,Canis,Animalia\n,Abies,Plantae\n',
    );

    prepFromCsv(input, prefix);
    const firstSearch = readFileSync(`${prefix}_species_search.txt`);
    const firstKingdom = readFileSync(`${prefix}_species_kingdom.tsv`);

    prepFromCsv(input, prefix);
    expect(readFileSync(`${prefix}_species_search.txt`).equals(firstSearch)).toBe(true);
    expect(readFileSync(`${prefix}_species_kingdom.tsv`).equals(firstKingdom)).toBe(true);
  });

  it('writes nothing when the species column is missing', () => {
    const input = writeInput('bad.csv', 'taxon,genus,kingdom\nPanthera leo,Panthera,Animalia\n');

    expect(() => prepFromCsv(input, prefix)).toThrow(MissingColumnsError);
    expect(existsSync(`${prefix}_species_search.txt`)).toBe(false);
    expect(existsSync(`${prefix}_species_kingdom.tsv`)).toBe(false);
  });

  it('completes when a quoted field is never closed', () => {
    const input = writeInput(
      'broken.csv',
      'species,genus,kingdom\nPanthera leo,Panthera,Animalia\n"Odd name,Oddus,Plantae\nZea mays,Zea,Plantae\n',
    );

    const summary = prepFromCsv(input, prefix);

    expect(summary.rowsRead).toBe(2);
    expect(readFileSync(summary.speciesSearchPath, 'utf-8')).toBe(
      'Odd name,Oddus,Plantae\nZea mays,Zea,Plantae\nPanthera leo\n',
    );
    expect(readFileSync(summary.speciesKingdomPath, 'utf-8')).toBe('Panthera leo\tAnimalia\r\n');
  });

  it('writes the unquoted name for a partly quoted field', () => {
    const input = writeInput('partial.csv', 'species,genus,kingdom\n"Puma" concolor,Puma,Animalia\n');

    const summary = prepFromCsv(input, prefix);

    expect(readFileSync(summary.speciesSearchPath, 'utf-8')).toBe('Puma concolor\n');
    expect(readFileSync(summary.speciesKingdomPath, 'utf-8')).toBe('Puma concolor\tAnimalia\r\n');
  });

  it('treats a blank first line as an empty header', () => {
    const input = writeInput('blank-first.tsv', '\nspecies\tgenus\tkingdom\nZea mays\tZea\tPlantae\n');

    let caught: unknown;
    try {
      prepFromCsv(input, prefix);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MissingColumnsError);
    if (caught instanceof MissingColumnsError) {
      expect(caught.missing).toEqual(['species', 'genus', 'kingdom']);
      expect(caught.found).toEqual([]);
    }
    expect(existsSync(`${prefix}_species_search.txt`)).toBe(false);
    expect(existsSync(`${prefix}_species_kingdom.tsv`)).toBe(false);
  });

  it('rejects an empty file', () => {
    const input = writeInput('empty.csv', '');
    expect(() => prepFromCsv(input, prefix)).toThrow(EmptyInputError);
    expect(existsSync(`${prefix}_species_search.txt`)).toBe(false);
  });

  it('rejects a file holding only a BOM', () => {
    const input = writeInput('bom.csv', Buffer.from([0xef, 0xbb, 0xbf]));
    expect(() => prepFromCsv(input, prefix)).toThrow(EmptyInputError);
  });

  it('rejects a missing input path', () => {
    expect(() => prepFromCsv(join(dir, 'absent.csv'), prefix)).toThrow(InputNotFoundError);
  });
});

describe('prepFromText', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gbif-prep-text-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes two empty files for a header without rows', () => {
    const summary = prepFromText('species,genus,kingdom\n', join(dir, 'empty'));
    expect(summary.rowsRead).toBe(0);
    expect(readFileSync(summary.speciesSearchPath, 'utf-8')).toBe('');
    expect(readFileSync(summary.speciesKingdomPath, 'utf-8')).toBe('');
  });

  it('labels an empty source in the error', () => {
    expect(() => prepFromText('', join(dir, 'x'))).toThrow('Input file appears to be empty: <input>');
  });
});

describe('formatReport', () => {
  it('lists counts and paths', () => {
    const report = formatReport({
      delimiter: ',',
      rowsRead: 3,
      uniqueSearchNames: 2,
      uniquePairs: 1,
      searchNames: ['Panthera leo', 'Quercus'],
      speciesSearchPath: 'run_species_search.txt',
      speciesKingdomPath: 'run_species_kingdom.tsv',
    });

    expect(report).toBe(
      'GBIF prep complete.\n' +
        '  Rows read from GBIF file : 3\n' +
        '  Unique names for search : 2 -> run_species_search.txt\n' +
        '  Unique species↔kingdom  : 1 -> run_species_kingdom.tsv',
    );
  });
});
