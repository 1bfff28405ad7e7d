import {
  EXPORT_HEADERS,
  buildWorkbook,
  csvEscape,
  exportFileName,
  exportRow,
  summaryRows,
  toCsv,
} from '../../../src/services/export.service.js';
import { complaintFixture } from '../../helpers/fixtures.js';

const createdAt = new Date(2025, 0, 14, 9, 5, 7).toISOString();

describe('exportRow', () => {
  it('fills placeholders for missing values', () => {
    expect(exportRow(complaintFixture({ createdAt }))).toEqual([
      'PO-000001',
      '2025-01-14 09:05:07',
      'Juan Dela Cruz',
      'N/A',
      '09171234567',
      'POWER OUTAGE',
      'No power since morning',
      'HIGH',
      'NEW',
      'Not assigned',
      'WebForm',
      'Brgy. Bacan, Cabatuan, Iloilo',
      'N/A',
      'N/A',
    ]);
  });

  it('keeps coordinates as numbers', () => {
    const row = exportRow(complaintFixture({ createdAt, location: { latitude: 10.7, longitude: 122.5, accuracy: 5 } }));
    expect(row.slice(12)).toEqual([10.7, 122.5]);
  });
});

describe('csv', () => {
  it('quotes every field and doubles embedded quotes', () => {
    expect(csvEscape('say "hi", then leave')).toBe('"say ""hi"", then leave"');
    expect(csvEscape(null)).toBe('""');
  });

  it('writes a BOM, a header and CRLF line endings', () => {
    const csv = toCsv([complaintFixture({ createdAt, description: 'Pole "leaning"' })]);
    const lines = csv.split('\r\n');

    expect(csv.startsWith('\uFEFF"Complaint ID","Date/Time"')).toBe(true);
    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe(
      '"PO-000001","2025-01-14 09:05:07","Juan Dela Cruz","N/A","09171234567","POWER OUTAGE","Pole ""leaning""",' +
        '"HIGH","NEW","Not assigned","WebForm","Brgy. Bacan, Cabatuan, Iloilo","N/A","N/A"',
    );
    expect(lines[2]).toBe('');
  });

  it('writes only the header for an empty list', () => {
    expect(toCsv([])).toBe(`\uFEFF${EXPORT_HEADERS.map((h) => `"${h}"`).join(',')}\r\n`);
  });
});

describe('exportFileName', () => {
  it('stamps the local time', () => {
    expect(exportFileName('xlsx', new Date(2025, 0, 14, 9, 5, 7))).toBe('Complaints_20250114_090507.xlsx');
  });
});

describe('summary', () => {
  const complaints = [
    complaintFixture({ priority: 'CRITICAL' }),
    complaintFixture({ priority: 'HIGH', status: 'RESOLVED' }),
    complaintFixture({ family: 'meter_concern', issueType: 'BILLING', priority: 'MEDIUM' }),
  ];

  it('counts by status, priority and issue type', () => {
    expect(summaryRows(complaints)).toEqual([
      ['Total', 'All complaints', 3],
      ['Status', 'NEW', 2],
      ['Status', 'RESOLVED', 1],
      ['Priority', 'CRITICAL', 1],
      ['Priority', 'HIGH', 1],
      ['Priority', 'MEDIUM', 1],
      ['Issue Type', 'BILLING', 1],
      ['Issue Type', 'POWER OUTAGE', 2],
    ]);
  });

  it('builds a complaints sheet and a summary sheet', () => {
    const workbook = buildWorkbook(complaints, new Date(2025, 0, 14, 9, 5, 7));
    const sheet = workbook.getWorksheet('Complaints');
    const summary = workbook.getWorksheet('Summary');

    expect(sheet?.getRow(1).getCell(1).value).toBe('Complaint ID');
    expect(sheet?.getRow(2).getCell(1).value).toBe('PO-000001');
    expect(sheet?.getRow(4).getCell(6).value).toBe('BILLING');
    expect(summary?.getRow(2).getCell(3).value).toBe(3);
  });
});
