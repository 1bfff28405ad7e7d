import { SMS_ERROR_MESSAGE, SMS_HELP_MESSAGE, confirmationMessage, twimlMessage } from '../../src/adapters/sms.adapter.js';
import type { Container } from '../../src/container.js';
import { ValidationError } from '../../src/lib/errors.js';
import { MESSAGES } from '../../src/services/validation.service.js';
import { RecordingObserver, outageInput } from '../helpers/fixtures.js';
import { createTestContainer } from '../helpers/testContainer.js';

const webReport = {
  full_name: 'Maria Santos',
  contact_number: '09171234567',
  address: 'Purok 2, Brgy. Sta. Rita, Oton',
  details: 'No power since 6pm',
  latitude: '10.69',
  longitude: 122.47,
  landmark: 'near the school',
};

describe('intake', () => {
  let container: Container;

  afterEach(() => container.stop());

  describe('web form', () => {
    beforeEach(async () => {
      container = await createTestContainer();
    });

    it('stores a HIGH outage with a reference number', async () => {
      const result = await container.webForm.submit(webReport);
      if (result.kind !== 'created') throw new Error('expected a new report');

      expect(result.jobOrderId).toBeNull();
      expect(result.complaint).toMatchObject({
        family: 'outage_report',
        displayId: 'PO-000001',
        customerName: 'Maria Santos',
        priority: 'HIGH',
        status: 'NEW',
        source: 'WebForm',
        location: { latitude: 10.69, longitude: 122.47, accuracy: null },
      });
      expect(result.complaint.referenceNo).toMatch(/^JO-\d{8}-\d{4}$/);
      expect(await container.complaints.outageLandmark(result.complaint.recordId)).toBe('near the school');
    });

    it('rejects a 12-digit phone number before writing', async () => {
      const attempt = container.webForm.submit({ ...webReport, contact_number: '091234567890' });
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toThrow(MESSAGES.phone);
      expect(await container.aggregator.aggregate()).toEqual([]);
    });

    it('rejects an address outside the service area', async () => {
      await expect(container.webForm.submit({ ...webReport, address: '123 Main St' })).rejects.toThrow(MESSAGES.address);
    });

    it('answers a same-day repeat at the same address with the first reference', async () => {
      const first = await container.webForm.submit(webReport);
      if (first.kind !== 'created') throw new Error('expected a new report');

      const second = await container.webForm.submit({ ...webReport, full_name: 'Pedro Santos', address: ' purok 2, brgy. sta. rita, oton ' });
      expect(second.kind).toBe('duplicate');
      if (second.kind === 'duplicate') expect(second.identifier).toBe(first.complaint.referenceNo);
      expect(await container.aggregator.aggregate()).toHaveLength(1);
    });

    it('stores one report when the same address is submitted twice at once', async () => {
      const results = await Promise.all([
        container.webForm.submit(webReport),
        container.webForm.submit({ ...webReport, full_name: 'Pedro Santos' }),
      ]);

      const created = results.filter((r) => r.kind === 'created');
      const duplicates = results.filter((r) => r.kind === 'duplicate');
      expect(created).toHaveLength(1);
      expect(duplicates).toHaveLength(1);

      const stored = await container.aggregator.aggregate();
      expect(stored).toHaveLength(1);
      const [duplicate] = duplicates;
      if (duplicate?.kind === 'duplicate') expect(duplicate.identifier).toBe(stored[0]?.referenceNo);
    });

    it('does not hold up reports at different addresses', async () => {
      const results = await Promise.all([
        container.webForm.submit(webReport),
        container.webForm.submit({ ...webReport, address: 'Purok 5, Brgy. Lanag, Tubungan' }),
      ]);
      expect(results.map((r) => r.kind)).toEqual(['created', 'created']);
      expect(await container.aggregator.aggregate()).toHaveLength(2);
    });

    it('accepts a new report once the earlier one is resolved', async () => {
      const first = await container.webForm.submit(webReport);
      if (first.kind !== 'created') throw new Error('expected a new report');
      await container.lifecycle.updateStatus('outage_report', first.complaint.recordId, 'RESOLVED');

      const second = await container.webForm.submit(webReport);
      expect(second.kind).toBe('created');
    });

    it('accepts the report when the duplicate lookup fails', async () => {
      jest.spyOn(container.complaints, 'findOpenOutageAt').mockRejectedValueOnce(new Error('store busy'));
      const result = await container.webForm.submit(webReport);
      expect(result.kind).toBe('created');
    });

    it('classifies a critical incident code', async () => {
      const result = await container.webForm.submit({ ...webReport, details: 'lights flickering', incident_type: 'fire_hazard' });
      if (result.kind !== 'created') throw new Error('expected a new report');
      expect(result.complaint.priority).toBe('CRITICAL');
    });
  });

  describe('web form with auto-assign', () => {
    beforeEach(async () => {
      container = await createTestContainer({ autoAssignWebReports: true });
    });

    it('creates a job order for HIGH reports', async () => {
      const result = await container.webForm.submit(webReport);
      if (result.kind !== 'created') throw new Error('expected a new report');

      expect(result.jobOrderId).toMatch(/^\d{10}$/);
      const stored = await container.aggregator.find('outage_report', result.complaint.recordId);
      expect(stored?.status).toBe('ASSIGNED');
      expect(stored?.jobOrderId).toBe(result.jobOrderId);
    });
  });

  describe('critical report end to end', () => {
    beforeEach(async () => {
      container = await createTestContainer();
    });

    it('ranks first and raises exactly one alert', async () => {
      await container.intake.submit(outageInput({ address: 'Brgy. Cagay, Alimodian', priority: 'HIGH' }));
      const old = await container.intake.submit(outageInput({ address: 'Brgy. Lanag, Tubungan', priority: 'CRITICAL' }));
      await container.lifecycle.updateStatus('outage_report', old.recordId, 'RESOLVED');

      const observer = new RecordingObserver();
      container.notifier.subscribe(observer);

      const result = await container.webForm.submit({ ...webReport, details: 'There is a fallen wire near my house' });
      if (result.kind !== 'created') throw new Error('expected a new report');

      const ranked = await container.aggregator.aggregate();
      expect(ranked.map((c) => [c.displayId, c.status, c.priority])).toEqual([
        ['PO-000003', 'NEW', 'CRITICAL'],
        ['PO-000001', 'NEW', 'HIGH'],
        ['PO-000002', 'RESOLVED', 'CRITICAL'],
      ]);
      expect(observer.ofType('critical_alert').map((e) => e.payload.complaint.displayId)).toEqual(['PO-000003']);
      expect(observer.ofType('stats_update').at(-1)?.payload).toEqual({
        totalActive: 3,
        inQueue: 0,
        criticalCount: 2,
        resolvedToday: 1,
      });
    });
  });

  describe('sms', () => {
    beforeEach(async () => {
      container = await createTestContainer();
    });

    it('stores a pipe-formatted outage and confirms it', async () => {
      const reply = await container.sms.receive({
        from: '+639170000000',
        body: 'ILECO OUTAGE juan cruz | brgy. bacan, cabatuan | 09171234567 | no power since 5pm',
      });

      expect(reply.status).toBe(200);
      expect(reply.complaint).toMatchObject({
        displayId: 'PO-000001',
        customerName: 'Juan Cruz',
        address: 'Brgy. Bacan, Cabatuan',
        priority: 'HIGH',
        source: 'SMS',
        referenceNo: null,
      });
      expect(reply.twiml).toBe(
        twimlMessage('✅ Your complaint has been received.\nRef: PO-000001\nType: POWER OUTAGE\nPriority: HIGH\nWe will respond shortly.'),
      );
    });

    it('files billing texts as MEDIUM meter concerns', async () => {
      const reply = await container.sms.receive({ from: '+63918', body: 'ILECO BILLING ana reyes | oton | 09181234567 | bill too high' });
      expect(reply.complaint).toMatchObject({ family: 'meter_concern', displayId: 'BC-000001', priority: 'MEDIUM', customerId: 'N/A' });
      if (reply.complaint) expect(reply.twiml).toBe(twimlMessage(confirmationMessage(reply.complaint)));
    });

    it('answers unknown formats with help and stores nothing', async () => {
      const reply = await container.sms.receive({ from: '+63918', body: 'hello' });
      expect(reply).toEqual({ status: 200, twiml: twimlMessage(SMS_HELP_MESSAGE) });
      expect(await container.aggregator.aggregate()).toEqual([]);
    });

    it('answers with an error when the store fails', async () => {
      jest.spyOn(container.complaints, 'insert').mockRejectedValueOnce(new Error('database is locked'));
      const reply = await container.sms.receive({ from: '+63918', body: 'ILECO walang kuryente' });
      expect(reply).toEqual({ status: 500, twiml: twimlMessage(SMS_ERROR_MESSAGE) });
    });
  });

  describe('edge node sync', () => {
    beforeEach(async () => {
      container = await createTestContainer();
    });

    it('stores the relayed report', async () => {
      const complaint = await container.sync.receive({
        report_id: 17,
        full_name: 'Maria Santos',
        contact_number: '09171234567',
        address: 'Purok 2, Oton',
        details: 'No power',
        latitude: '10.69',
        longitude: null,
        priority: 'high',
      });
      expect(complaint).toMatchObject({ displayId: 'PO-000001', priority: 'HIGH', source: 'AWS-EC2-Public', location: null });
    });

    it('rejects a payload without details', async () => {
      await expect(container.sync.receive({ full_name: 'Maria Santos' })).rejects.toThrow('Missing required fields');
    });
  });
});
