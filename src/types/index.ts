// Complaint families: one table each, ids are only unique within a family
export const FAMILIES = ['outage_report', 'meter_concern', 'agent_queue'] as const;
export type Family = (typeof FAMILIES)[number];

// Status lifecycle: NEW → ASSIGNED → IN_PROGRESS → RESOLVED (operators may set any value)
export const STATUSES = ['NEW', 'ASSIGNED', 'IN_PROGRESS', 'RESOLVED'] as const;
export type ComplaintStatus = (typeof STATUSES)[number];

export const PRIORITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const ISSUE_TYPES = ['POWER_OUTAGE', 'BILLING', 'SERVICE'] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

export type Source = 'Chatbot' | 'WebForm' | 'SMS' | 'AWS-EC2-Public' | 'Synced from EC2';

export interface GeoLocation {
  latitude: number;
  longitude: number;
  accuracy: number | null;
}

// Normalized view over the three families
export interface Complaint {
  family: Family;
  recordId: number;
  displayId: string;          // PO-000123 / BC-000123 / SR-000123
  referenceNo: string | null; // JO-YYYYMMDD-NNNN given to the customer at intake
  jobOrderId: string | null;  // set once by assignment
  customerName: string;
  customerContact: string;
  customerId: string | null;  // account number, when known
  address: string;
  issueType: IssueType;
  description: string;
  summary: string;
  // Stored values; anything outside the enums sorts after the known ones
  priority: Priority | string;
  status: ComplaintStatus | string;
  hidden: boolean;
  source: string;
  createdAt: string;
  resolvedAt: string | null;
  location: GeoLocation | null;
}

// Raw dashboard filters, as they arrive from query strings
export interface ComplaintFilters {
  status?: string;
  priority?: string;
  issueType?: string;
  search?: string;
  dateFrom?: string;
  dateTo?: string;
  timeFrom?: string;
  timeTo?: string;
  includeHidden?: boolean;
}

export interface DashboardStats {
  totalActive: number;
  inQueue: number;
  criticalCount: number;
  resolvedToday: number;
}

export interface NewComplaintInput {
  family: Family;
  customerName: string;
  customerContact: string;
  address: string;
  description: string;
  priority: Priority;
  source: Source;
  // Only set when copying a report that already exists on the sibling node
  status?: ComplaintStatus;
  createdAt?: string;
  referenceNo?: string | null;
  conversationId?: string | null;
  accountNumber?: string | null;
  email?: string | null;
  location?: GeoLocation | null;
  incident?: {
    type?: string | null;
    affectedArea?: string | null;
    time?: string | null;
    duration?: string | null;
    landmark?: string | null;
  };
}

// Outcome of an intake attempt
export type IntakeResult =
  | { kind: 'created'; complaint: Complaint }
  | { kind: 'duplicate'; existing: Complaint; identifier: string };

// Events pushed to dashboard observers
export type RealtimeEvent =
  | { type: 'new_complaint'; payload: Complaint }
  | { type: 'critical_alert'; payload: { message: string; sound: boolean; complaint: Complaint } }
  | {
      type: 'status_update';
      payload: { family: Family; recordId: number; oldStatus: string; newStatus: ComplaintStatus; jobOrderId?: string };
    }
  | { type: 'complaint_hidden'; payload: { family: Family; recordId: number } }
  | { type: 'stats_update'; payload: DashboardStats }
  | { type: 'user_count_update'; payload: { count: number } };

export type RealtimeEventType = RealtimeEvent['type'];

export interface Observer {
  id: string;
  send(event: RealtimeEvent): void;
}

// Operator session
export interface SessionUser {
  userId: number;
  username: string;
  fullName: string;
  role: string;
}
