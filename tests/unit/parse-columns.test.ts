import { describe, expect, it } from 'vitest';

import { parseAttendanceReport } from '../../src/parser/parse.js';
import { htmlDocument, reportTable } from '../../src/testkit/report-fixtures.js';

function serviceReport(headers: readonly string[]): string {
  return htmlDocument(reportTable(headers, [headers.map((_, index) => (index < 2 ? 'Pat' : 'Y'))]));
}

describe('column planning', () => {
  it('keeps Sunday service columns and reports every dropped column', () => {
    const result = parseAttendanceReport(
      serviceReport([
        'First Name',
        'Last Name',
        'Email',
        '10:30 AM 05/01/2025',
        'Christmas Carols 10:30 AM 22/12/2024',
        '8:30 AM 06/01/2025',
        '10:30 AM 30/02/2025',
        'Attended',
        '10:30 AM 19/01'
      ])
    );

    expect(result.report?.columns.map((column) => column.index)).toEqual([3]);
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['COLUMN_EXCLUDED_SERVICE', 'info'],
      ['COLUMN_WRONG_WEEKDAY', 'info'],
      ['COLUMN_INVALID_DATE', 'warning'],
      ['COLUMN_NOT_SERVICE', 'info'],
      ['COLUMN_MISSING_YEAR', 'warning']
    ]);
  });

  it('orders columns chronologically whatever the header order', () => {
    const result = parseAttendanceReport(
      serviceReport(['First Name', 'Last Name', '10:30 AM 12/01/2025', '8:30 AM 05/01/2025', '10:30 AM 05/01/2025'])
    );

    expect(result.report?.columns.map((column) => [column.date, column.serviceTime])).toEqual([
      ['2025-01-05', '8:30'],
      ['2025-01-05', '10:30'],
      ['2025-01-12', '10:30']
    ]);
  });

  it('drops columns dated after the as-of day', () => {
    const result = parseAttendanceReport(
      serviceReport(['First Name', 'Last Name', '10:30 AM 05/01/2025', '10:30 AM 12/01/2025']),
      { asOf: '2025-01-10' }
    );

    expect(result.report?.columns.map((column) => column.date)).toEqual(['2025-01-05']);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['COLUMN_FUTURE_DATE']);
  });

  it('keeps only prayer meetings of the reporting year for prayer reports', () => {
    const result = parseAttendanceReport(
      serviceReport([
        'First Name',
        'Last Name',
        'Weekly Prayer Meeting 04/01/2025',
        'Quarterly Prayer Meeting 11/01/2025',
        '10:30 AM 05/01/2025',
        'Weekly Prayer Meeting 28/12/2024'
      ]),
      { profile: 'prayer', reportingYear: 2025 }
    );

    expect(result.report?.columns.map((column) => [column.date, column.meetingKind])).toEqual([
      ['2025-01-04', 'weekly'],
      ['2025-01-11', 'quarterly']
    ]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'COLUMN_NOT_PRAYER_MEETING',
      'COLUMN_OUTSIDE_REPORTING_YEAR'
    ]);
  });

  it('fails when no column survives planning', () => {
    const result = parseAttendanceReport(serviceReport(['First Name', 'Last Name', 'Attended']));

    expect(result.report).toBeUndefined();
    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['COLUMN_NOT_SERVICE', 'info'],
      ['NO_SERVICE_COLUMNS', 'error']
    ]);
  });
});
