import {
  JOB_ORDER_PLACEHOLDERS,
  buildJobOrder,
  extractLocationParts,
  generateJobOrderId,
  jobOrderNotes,
  jobOrderType,
} from '../../../src/services/job-order.service.js';
import { complaintFixture } from '../../helpers/fixtures.js';

describe('extractLocationParts', () => {
  it('takes the barangay from the first part and the town from anywhere', () => {
    expect(extractLocationParts('Brgy. Bacan, Cabatuan, Iloilo')).toEqual({ barangay: 'Bacan', town: 'Cabatuan' });
  });

  it('drops the spelled-out barangay word', () => {
    expect(extractLocationParts('barangay san jose, sta barbara')).toEqual({ barangay: 'San Jose', town: 'Sta. Barbara' });
  });

  it('maps spelling variants to one town name', () => {
    expect(extractLocationParts('Purok 3, Miagao').town).toBe('Miag-ao');
  });

  it('leaves the town empty outside the service area', () => {
    expect(extractLocationParts('123 Main St')).toEqual({ barangay: '123 Main St', town: '' });
    expect(extractLocationParts(null)).toEqual({ barangay: '', town: '' });
  });
});

describe('generateJobOrderId', () => {
  it('returns ten digits', () => {
    expect(generateJobOrderId()).toMatch(/^\d{10}$/);
  });
});

describe('jobOrderType', () => {
  it('is high for outage wording', () => {
    expect(jobOrderType('Power outage reported at Brgy. Bacan')).toBe('high');
    expect(jobOrderType('no display')).toBe('low');
  });
});

describe('buildJobOrder', () => {
  const now = new Date(2025, 0, 14, 15, 4, 5);

  it('fills every column from the complaint', () => {
    const complaint = complaintFixture({
      referenceNo: 'JO-20250114-4821',
      description: 'Power outage reported at Brgy. Bacan, Cabatuan, Iloilo',
      location: { latitude: 10.7, longitude: 122.5, accuracy: null },
    });

    expect(buildJobOrder(complaint, '1234567890', now, { landmark: 'near the chapel' })).toEqual({
      uniqueId: '1234567890',
      creator: '09171234567',
      created: '01/14/25 03:04:05 PM',
      follower: '09171234567',
      followed: '01/14/25 03:04:05 PM',
      name: 'Juan Dela Cruz',
      spinners: '09171234567',
      town0: 'Cabatuan',
      brgy0: 'Bacan',
      town: JOB_ORDER_PLACEHOLDERS.town,
      brgy: JOB_ORDER_PLACEHOLDERS.brgy,
      town2: 'Cabatuan',
      brgy2: 'Bacan',
      assignedto: 'Cabatuan',
      status: 'Select Status',
      subs: 'Substation',
      feeder: 'Feeder',
      section: 'Category',
      cause: 'Power outage reported at Brgy. Bacan, Cabatuan, Iloilo',
      equip: 'Equipment',
      type: 'high',
      notes: 'Original Job Order: JO-20250114-4821 | Priority: HIGH | Power outage reported at Brgy. Bacan, Cabatuan, Iloilo',
      landmark: 'near the chapel',
      phone: '09171234567',
      location: 'Brgy. Bacan, Cabatuan, Iloilo',
      latitude: '10.7',
      longitude: '122.5',
      actiontaken: 'Pending',
    });
  });

  it('falls back to the name when there is no contact number', () => {
    const row = buildJobOrder(complaintFixture({ customerContact: '' }), '1234567890', now);
    expect(row.creator).toBe('Juan Dela Cruz');
    expect(row.follower).toBe('Juan Dela Cruz');
    expect(row.latitude).toBe('');
    expect(row.landmark).toBe('');
  });

  it('omits the original reference from notes when there is none', () => {
    expect(jobOrderNotes({ referenceNo: null, priority: 'LOW', description: 'no display' })).toBe('Priority: LOW | no display');
  });
});
