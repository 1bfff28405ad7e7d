import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { PeerUnavailableError, ValidationError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Complaint } from '../types/index.js';

const log = logger.child('[relay]');

export interface RelayConfig {
  relayUrl: string;
  syncSecret: string;
  outboundTimeoutMs: number;
}

// Body accepted by POST /api/webhook/new_complaint on the sibling node
export interface RelayPayload {
  report_id: number;
  full_name: string;
  contact_number: string;
  email: string | null;
  address: string;
  latitude: number | null;
  longitude: number | null;
  details: string;
  incident_type: string | null;
  priority: string;
  timestamp: string;
}

export function toRelayPayload(complaint: Complaint, extra: { email?: string | null; incidentType?: string | null } = {}): RelayPayload {
  return {
    report_id: complaint.recordId,
    full_name: complaint.customerName,
    contact_number: complaint.customerContact,
    email: extra.email ?? null,
    address: complaint.address,
    latitude: complaint.location?.latitude ?? null,
    longitude: complaint.location?.longitude ?? null,
    details: complaint.description,
    incident_type: extra.incidentType ?? null,
    priority: complaint.priority,
    timestamp: complaint.createdAt,
  };
}

// How far back the export feed reaches
export const FEED_WINDOW_DAYS = 7;

// One row of GET /api/export_complaints
export interface FeedItem extends RelayPayload {
  status: string;
  source: string;
}

export function toFeedItem(complaint: Complaint, extra: { email?: string | null; incidentType?: string | null } = {}): FeedItem {
  return { ...toRelayPayload(complaint, extra), status: complaint.status, source: complaint.source };
}

const FeedSchema = z.object({ complaints: z.array(z.unknown()) });

export type RelayClient = ReturnType<typeof createRelayClient>;

export function createRelayClient(config: RelayConfig, http?: AxiosInstance) {
  const client = http ?? axios.create({ timeout: config.outboundTimeoutMs });

  const base = config.relayUrl.replace(/\/+$/, '');
  const headers = config.syncSecret ? { 'x-sync-secret': config.syncSecret } : {};
  // injected clients carry no timeout of their own
  const timeout = config.outboundTimeoutMs;

  return {
    get configured(): boolean {
      return Boolean(config.relayUrl);
    },

    // The local write is already committed; a failed relay only logs
    async forward(payload: RelayPayload): Promise<boolean> {
      if (!config.relayUrl) return false;
      try {
        await client.post(`${base}/api/webhook/new_complaint`, payload, { headers, timeout });
        log.info('Relayed to sibling node', { reportId: payload.report_id });
        return true;
      } catch (err) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        log.warn('Relay failed', { reportId: payload.report_id, status, error: errorMessage(err) });
        return false;
      }
    },

    /** Reads the sibling node's export feed. Items are returned unvalidated. */
    async pull(): Promise<unknown[]> {
      if (!config.relayUrl) throw new ValidationError('No sibling node configured (RELAY_URL)');
      let data: unknown;
      try {
        ({ data } = await client.get<unknown>(`${base}/api/export_complaints`, { headers, timeout }));
      } catch (err) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        log.warn('Export feed unavailable', { status, error: errorMessage(err) });
        throw new PeerUnavailableError('Failed to fetch complaints from the sibling node', err);
      }
      const parsed = FeedSchema.safeParse(data);
      if (!parsed.success) throw new PeerUnavailableError('Sibling node sent an unreadable export feed');
      return parsed.data.complaints;
    },
  };
}
