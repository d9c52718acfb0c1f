import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  coerceBioRows,
  coerceFloat,
  coerceInt,
  coerceStatsRows,
  parseCsvText,
  readBioCsv,
  toBioRecord,
  toStatsRecord,
} from './coerce';

const STATS_HEADER =
  'Number,FirstName,LastName,GP,G,A,PTS,SH,SH_PCT,plus_minus,PPG,SHG,FG,GWG,GTG,OTG,HTG,UAG,PN-PIM,MIN,MAJ,OTH,BLK';

describe('coerceInt', () => {
  it('parses whole numbers with an optional sign', () => {
    expect(coerceInt('14')).toBe(14);
    expect(coerceInt(' -2 ')).toBe(-2);
    expect(coerceInt('+3')).toBe(3);
    expect(coerceInt('007')).toBe(7);
  });

  it('returns null for blanks and anything that is not an integer', () => {
    expect(coerceInt('')).toBeNull();
    expect(coerceInt(undefined)).toBeNull();
    expect(coerceInt('-')).toBeNull();
    expect(coerceInt('3.5')).toBeNull();
    expect(coerceInt('12abc')).toBeNull();
    expect(coerceInt('99999999999999999999')).toBeNull();
  });
});

describe('coerceFloat', () => {
  it('parses decimals including a leading dot', () => {
    expect(coerceFloat('.125')).toBe(0.125);
    expect(coerceFloat('0.5')).toBe(0.5);
    expect(coerceFloat('12')).toBe(12);
    expect(coerceFloat('1e2')).toBe(100);
  });

  it('returns null when the text is not a number', () => {
    expect(coerceFloat('')).toBeNull();
    expect(coerceFloat('.')).toBeNull();
    expect(coerceFloat('12.5%')).toBeNull();
    expect(coerceFloat('NaN')).toBeNull();
  });
});

describe('toBioRecord', () => {
  it('trims text, parses the jersey number and defaults missing fields', () => {
    expect(toBioRecord({ Number: ' 9 ', Player: ' Jane Doe ', FirstName: 'Jane', LastName: 'Doe' })).toEqual({
      Number: 9,
      Player: 'Jane Doe',
      FirstName: 'Jane',
      LastName: 'Doe',
      Position: '',
      Height: '',
      Weight: '',
      Class: '',
      Hometown: '',
      HighSchool: '',
      extra: {},
    });
  });
});

describe('toStatsRecord', () => {
  it('maps the PN-PIM header onto PN_PIM and leaves other absent cells empty', () => {
    const record = toStatsRecord({ FirstName: 'Jane', LastName: 'Doe', 'PN-PIM': '5' });

    expect(record.PN_PIM).toBe('5');
    expect(record.Number).toBeNull();
    expect(record.GP).toBeNull();
    expect(record.SH_PCT).toBeNull();
    expect(record.BLK).toBeNull();
    expect(record.extra).toEqual({});
  });
});

describe('coerceStatsRows', () => {
  it('coerces a complete stats row', () => {
    const [row] = parseCsvText(`${STATS_HEADER}\n12,Jane,Doe,30,10,12,22,80,.125,-2,3,1,2,2,0,1,0,0,4-8,8,0,0,15\n`);
    const report = coerceStatsRows([row]);

    expect(report.rowCount).toBe(1);
    expect(report.unknownColumns).toEqual([]);
    expect(report.records[0]).toEqual({
      Number: 12,
      FirstName: 'Jane',
      LastName: 'Doe',
      GP: 30,
      G: 10,
      A: 12,
      PTS: 22,
      SH: 80,
      SH_PCT: 0.125,
      plus_minus: -2,
      PPG: 3,
      SHG: 1,
      FG: 2,
      GWG: 2,
      GTG: 0,
      OTG: 1,
      HTG: 0,
      UAG: 0,
      PN_PIM: '4-8',
      MIN: 8,
      MAJ: 0,
      OTH: 0,
      BLK: 15,
      extra: {},
    });
  });

  it('reports undeclared columns and keeps their values', () => {
    const report = coerceStatsRows([
      { FirstName: 'Jane', LastName: 'Doe', FOW: '41' },
      { FirstName: 'Ann', LastName: 'Lee', FOW: '3', TOI: '12:40' },
    ]);

    expect(report.unknownColumns).toEqual(['FOW', 'TOI']);
    expect(report.records[0].extra).toEqual({ FOW: '41' });
    expect(report.records[1].extra).toEqual({ FOW: '3', TOI: '12:40' });
  });
});

describe('parseCsvText', () => {
  it('strips a byte order mark and skips blank lines', () => {
    const rows = parseCsvText('\ufeffNumber,FirstName,LastName\n7,Jane,Doe\n\n');
    expect(rows).toEqual([{ Number: '7', FirstName: 'Jane', LastName: 'Doe' }]);
  });

  it('unquotes embedded commas', () => {
    const rows = parseCsvText('FirstName,LastName,Hometown\nJane,Doe,"Erie, Pa."\n');
    expect(rows[0].Hometown).toBe('Erie, Pa.');
  });
});

describe('readBioCsv', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'coerce-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('gives the same records on every read of the same file', () => {
    const csvPath = path.join(tmpDir, 'bio.csv');
    fs.writeFileSync(
      csvPath,
      'Number,Player,FirstName,LastName,Position,Height,Weight,Class,Hometown,HighSchool\n' +
      '7,Jane Doe,Jane,Doe,F,5-7,150 lbs,Sophomore,"Erie, Pa.",Cathedral Prep\n' +
      ',Ann Lee,Ann,Lee,D,,,,,\n'
    );

    const first = readBioCsv(csvPath);
    const second = readBioCsv(csvPath);

    expect(second).toEqual(first);
    expect(first.rowCount).toBe(2);
    expect(first.records[0].Hometown).toBe('Erie, Pa.');
    expect(first.records[1].Number).toBeNull();
    expect(first.records[1].Height).toBe('');
  });

  it('throws when the file is missing', () => {
    expect(() => readBioCsv(path.join(tmpDir, 'missing.csv'))).toThrow(/ENOENT/);
  });

  it('coerces rows passed in directly', () => {
    const report = coerceBioRows([{ FirstName: 'Jane', LastName: 'Doe', Number: 'n/a' }]);
    expect(report.records[0].Number).toBeNull();
  });
});
