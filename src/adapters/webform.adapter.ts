import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Complaint } from '../types/index.js';
import type { IntakeService } from '../services/intake.service.js';
import type { LifecycleManager } from '../services/lifecycle.service.js';
import { classifyOutagePriority } from '../services/priority.service.js';
import { toRelayPayload, type RelayClient } from '../services/relay.service.js';
import { validateAddress, validateFullName, validatePhone, type Validation } from '../services/validation.service.js';

const log = logger.child('[intake/web]');

const requiredText = z.string().trim().min(1);
const optionalText = z.string().trim().nullish().transform((v) => v || null);
const coordinate = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

export const WebReportSchema = z.object({
  full_name: requiredText,
  contact_number: requiredText,
  address: requiredText,
  details: requiredText,
  latitude: coordinate.pipe(z.number().min(-90).max(90)),
  longitude: coordinate.pipe(z.number().min(-180).max(180)),
  accuracy: z.union([z.number(), z.string()]).optional().nullable(),
  email: optionalText,
  account_number: optionalText,
  incident_type: z.string().trim().nullish().transform((v) => v || 'power_outage'),
  affected_area: optionalText,
  incident_time: optionalText,
  duration: optionalText,
  landmark: optionalText,
});

export type WebReport = z.infer<typeof WebReportSchema>;

export type WebFormResult =
  | { kind: 'created'; complaint: Complaint; jobOrderId: string | null }
  | { kind: 'duplicate'; existing: Complaint; identifier: string };

function accuracyOf(value: WebReport['accuracy']): number | null {
  if (value === undefined || value === null || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function check(result: Validation): string {
  if (!result.ok) throw new ValidationError(result.message);
  return result.value;
}

export function parseWebReport(body: unknown): WebReport {
  const parsed = WebReportSchema.safeParse(body);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join('.')))];
    throw new ValidationError(`Missing or invalid fields: ${fields.join(', ')}`);
  }
  return parsed.data;
}

export interface WebFormDeps {
  intake: IntakeService;
  lifecycle: LifecycleManager;
  relay: RelayClient;
  autoAssign: boolean;
}

export type WebFormIntake = ReturnType<typeof createWebFormIntake>;

export function createWebFormIntake(deps: WebFormDeps) {
  const { intake, lifecycle, relay, autoAssign } = deps;

  async function tryAutoAssign(complaint: Complaint): Promise<string | null> {
    if (!autoAssign || (complaint.priority !== 'CRITICAL' && complaint.priority !== 'HIGH')) return null;
    try {
      const { jobOrderId } = await lifecycle.assignJobOrder(complaint.family, complaint.recordId, 'auto-assign');
      return jobOrderId;
    } catch (err) {
      log.error('Auto-assign failed', err, { displayId: complaint.displayId });
      return null;
    }
  }

  return {
    async submit(body: unknown): Promise<WebFormResult> {
      const report = parseWebReport(body);
      const customerName = check(validateFullName(report.full_name));
      const customerContact = check(validatePhone(report.contact_number));
      const address = check(validateAddress(report.address));
      const priority = classifyOutagePriority(report.details, report.incident_type);

      const result = await intake.submitOutage(
        {
          customerName,
          customerContact,
          address,
          description: report.details,
          priority,
          source: 'WebForm',
          email: report.email,
          accountNumber: report.account_number,
          location: { latitude: report.latitude, longitude: report.longitude, accuracy: accuracyOf(report.accuracy) },
          incident: {
            type: report.incident_type,
            affectedArea: report.affected_area,
            time: report.incident_time,
            duration: report.duration,
            landmark: report.landmark,
          },
        },
        { dedup: true },
      );
      if (result.kind === 'duplicate') return result;

      const jobOrderId = await tryAutoAssign(result.complaint);
      await relay.forward(toRelayPayload(result.complaint, { email: report.email, incidentType: report.incident_type }));
      return { kind: 'created', complaint: result.complaint, jobOrderId };
    },
  };
}
