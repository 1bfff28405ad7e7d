import type { Complaint, NewComplaintInput, Observer, RealtimeEvent, RealtimeEventType } from '../../src/types/index.js';

export function complaintFixture(overrides: Partial<Complaint> = {}): Complaint {
  return {
    family: 'outage_report',
    recordId: 1,
    displayId: 'PO-000001',
    referenceNo: null,
    jobOrderId: null,
    customerName: 'Juan Dela Cruz',
    customerContact: '09171234567',
    customerId: null,
    address: 'Brgy. Bacan, Cabatuan, Iloilo',
    issueType: 'POWER_OUTAGE',
    description: 'No power since morning',
    summary: 'No power since morning',
    priority: 'HIGH',
    status: 'NEW',
    hidden: false,
    source: 'WebForm',
    createdAt: new Date(2025, 0, 14, 9, 0, 0).toISOString(),
    resolvedAt: null,
    location: null,
    ...overrides,
  };
}

export function outageInput(overrides: Partial<NewComplaintInput> = {}): NewComplaintInput {
  return {
    family: 'outage_report',
    customerName: 'Juan Dela Cruz',
    customerContact: '09171234567',
    address: 'Brgy. Bacan, Cabatuan, Iloilo',
    description: 'No power since morning',
    priority: 'HIGH',
    source: 'WebForm',
    ...overrides,
  };
}

// Keeps every event it is sent; `failing` makes the next send throw
export class RecordingObserver implements Observer {
  readonly events: RealtimeEvent[] = [];
  failing = false;

  constructor(readonly id = 'test-observer') {}

  send(event: RealtimeEvent): void {
    if (this.failing) throw new Error('socket closed');
    this.events.push(event);
  }

  ofType<T extends RealtimeEventType>(type: T): Extract<RealtimeEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<RealtimeEvent, { type: T }> => e.type === type);
  }
}
