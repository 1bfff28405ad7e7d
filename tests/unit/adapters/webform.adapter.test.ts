import { parseWebReport } from '../../../src/adapters/webform.adapter.js';
import { syncPriority } from '../../../src/adapters/sync.adapter.js';
import { ValidationError } from '../../../src/lib/errors.js';

const body = {
  full_name: 'Maria Santos',
  contact_number: '09171234567',
  address: 'Purok 2, Brgy. Sta. Rita, Oton',
  details: 'No power since 6pm',
  latitude: '10.69',
  longitude: 122.47,
};

describe('parseWebReport', () => {
  it('coerces coordinates and defaults the incident type', () => {
    const report = parseWebReport({ ...body, email: '', landmark: null });
    expect(report.latitude).toBe(10.69);
    expect(report.longitude).toBe(122.47);
    expect(report.incident_type).toBe('power_outage');
    expect(report.email).toBeNull();
    expect(report.landmark).toBeNull();
  });

  it('lists every missing field', () => {
    expect(() => parseWebReport({})).toThrow(
      new ValidationError('Missing or invalid fields: full_name, contact_number, address, details, latitude, longitude'),
    );
  });

  it('rejects coordinates out of range', () => {
    expect(() => parseWebReport({ ...body, latitude: 95 })).toThrow('Missing or invalid fields: latitude');
    expect(() => parseWebReport({ ...body, longitude: 'east' })).toThrow('Missing or invalid fields: longitude');
  });

  it('rejects blank required text', () => {
    expect(() => parseWebReport({ ...body, details: '   ' })).toThrow('Missing or invalid fields: details');
  });
});

describe('syncPriority', () => {
  it('keeps a known tier from the edge node', () => {
    expect(syncPriority({ priority: 'critical', details: 'no power', incident_type: null })).toBe('CRITICAL');
  });

  it('classifies when the tier is missing or unknown', () => {
    expect(syncPriority({ priority: 'urgent', details: 'sparking wire', incident_type: null })).toBe('CRITICAL');
    expect(syncPriority({ priority: null, details: 'no power', incident_type: null })).toBe('HIGH');
  });
});
