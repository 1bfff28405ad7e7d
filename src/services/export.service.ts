import { Workbook } from 'exceljs';
import { format } from 'date-fns';
import type { Complaint } from '../types/index.js';

export const EXPORT_HEADERS = [
  'Complaint ID',
  'Date/Time',
  'Customer Name',
  'Customer ID',
  'Contact Number',
  'Issue Type',
  'Description',
  'Priority',
  'Status',
  'Job Order ID',
  'Source',
  'Address',
  'Latitude',
  'Longitude',
] as const;

type ExportCell = string | number;

function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : format(date, 'yyyy-MM-dd HH:mm:ss');
}

export function issueTypeLabel(issueType: string): string {
  return issueType.replace(/_/g, ' ');
}

export function exportRow(c: Complaint): ExportCell[] {
  return [
    c.displayId,
    formatTimestamp(c.createdAt),
    c.customerName,
    c.customerId || 'N/A',
    c.customerContact,
    issueTypeLabel(c.issueType),
    c.description,
    c.priority,
    c.status,
    c.jobOrderId || 'Not assigned',
    c.source,
    c.address,
    c.location ? c.location.latitude : 'N/A',
    c.location ? c.location.longitude : 'N/A',
  ];
}

export function csvEscape(value: unknown): string {
  const text = String(value ?? '');
  return `"${text.replace(/"/g, '""')}"`;
}

// BOM, quoted fields, CRLF
export function toCsv(complaints: Complaint[]): string {
  const lines = [
    EXPORT_HEADERS.map(csvEscape).join(','),
    ...complaints.map((c) => exportRow(c).map(csvEscape).join(',')),
  ];
  return `\uFEFF${lines.join('\r\n')}\r\n`;
}

export function exportFileName(extension: 'csv' | 'xlsx', now: Date = new Date()): string {
  return `Complaints_${format(now, 'yyyyMMdd_HHmmss')}.${extension}`;
}

function countBy(complaints: Complaint[], key: (c: Complaint) => string): [string, number][] {
  const counts = new Map<string, number>();
  for (const c of complaints) counts.set(key(c), (counts.get(key(c)) ?? 0) + 1);
  return [...counts.entries()].sort(([a], [b]) => a.localeCompare(b));
}

export function summaryRows(complaints: Complaint[]): [string, string, number][] {
  return [
    ['Total', 'All complaints', complaints.length],
    ...countBy(complaints, (c) => c.status).map(([k, n]): [string, string, number] => ['Status', k, n]),
    ...countBy(complaints, (c) => c.priority).map(([k, n]): [string, string, number] => ['Priority', k, n]),
    ...countBy(complaints, (c) => issueTypeLabel(c.issueType)).map(([k, n]): [string, string, number] => ['Issue Type', k, n]),
  ];
}

export function buildWorkbook(complaints: Complaint[], generatedAt: Date = new Date()): Workbook {
  const workbook = new Workbook();
  workbook.created = generatedAt;

  const sheet = workbook.addWorksheet('Complaints');
  sheet.columns = EXPORT_HEADERS.map((header) => ({
    header,
    key: header,
    width: header === 'Description' || header === 'Address' ? 40 : 18,
  }));
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
  for (const c of complaints) sheet.addRow(exportRow(c));

  const summary = workbook.addWorksheet('Summary');
  summary.columns = [
    { header: 'Group', key: 'group', width: 14 },
    { header: 'Value', key: 'value', width: 24 },
    { header: 'Count', key: 'count', width: 10 },
  ];
  summary.getRow(1).font = { bold: true };
  for (const row of summaryRows(complaints)) summary.addRow(row);
  summary.addRow([]);
  summary.addRow(['Generated', format(generatedAt, 'yyyy-MM-dd HH:mm:ss'), '']);

  return workbook;
}

export async function toXlsx(complaints: Complaint[], generatedAt: Date = new Date()): Promise<Buffer> {
  const data = await buildWorkbook(complaints, generatedAt).xlsx.writeBuffer();
  return Buffer.from(data);
}
