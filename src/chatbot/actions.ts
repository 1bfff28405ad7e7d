import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { ComplaintRepository } from '../services/complaint.service.js';
import { generateReferenceNo, type IntakeService } from '../services/intake.service.js';
import type { LifecycleManager } from '../services/lifecycle.service.js';
import { classifyConcernPriority } from '../services/priority.service.js';
import {
  validateAccountNumber,
  validateAddress,
  validateAgentConcern,
  validateFullName,
  validateJobOrderReference,
  validateMeterConcern,
  validatePhone,
  type Validation,
} from '../services/validation.service.js';
import { replies } from './replies.js';

const log = logger.child('[chatbot]');

export const CHATBOT_OUTAGE_PRIORITY = 'HIGH';

// Wire format shared with the dialogue engine's action server protocol
export type ActionEvent =
  | { event: 'slot'; name: string; value: string | null }
  | { event: 'pause' }
  | { event: 'resume' };

export interface ActionResponse {
  events: ActionEvent[];
  responses: { text: string }[];
}

export const ActionRequestSchema = z.object({
  next_action: z.string().trim().min(1),
  sender_id: z.string().optional(),
  tracker: z
    .object({
      sender_id: z.string().optional(),
      slots: z.record(z.unknown()).default({}),
    })
    .default({}),
});

export type ActionRequest = z.infer<typeof ActionRequestSchema>;

type Slots = Record<string, unknown>;
type SlotValidator = (value: string) => Validation | Promise<Validation>;
type FormDef = Readonly<Record<string, SlotValidator>>;

export interface ActionDeps {
  complaints: ComplaintRepository;
  intake: IntakeService;
  lifecycle: LifecycleManager;
  now?: () => Date;
}

interface ActionContext {
  senderId: string;
  slots: Slots;
}

type ActionHandler = (ctx: ActionContext) => Promise<ActionResponse>;

const reply = (...texts: string[]): { text: string }[] => texts.map((text) => ({ text }));
const slot = (name: string, value: string | null): ActionEvent => ({ event: 'slot', name, value });
const clearSlots = (form: FormDef): ActionEvent[] => Object.keys(form).map((name) => slot(name, null));

function slotText(slots: Slots, name: string): string | null {
  const value = slots[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

type FormCheck =
  | { complete: true; values: Record<string, string> }
  | { complete: false; events: ActionEvent[]; messages: string[]; missing: boolean };

/** Validates every slot of a form; filled slots are normalized, bad ones cleared. */
async function checkForm(form: FormDef, slots: Slots): Promise<FormCheck> {
  const values: Record<string, string> = {};
  const events: ActionEvent[] = [];
  const messages: string[] = [];
  let missing = false;

  for (const [name, validate] of Object.entries(form)) {
    const raw = slotText(slots, name);
    if (raw === null || raw.trim() === '') {
      missing = true;
      continue;
    }
    const result = await validate(raw);
    if (result.ok) {
      values[name] = result.value;
      events.push(slot(name, result.value));
    } else {
      messages.push(result.message);
      events.push(slot(name, null));
    }
  }

  if (!missing && messages.length === 0) return { complete: true, values };
  return { complete: false, events, messages, missing };
}

function need(values: Record<string, string>, name: string): string {
  const value = values[name];
  if (value === undefined) throw new Error(`slot ${name} was not validated`);
  return value;
}

export type ActionRegistry = ReturnType<typeof createActionRegistry>;

export function createActionRegistry(deps: ActionDeps) {
  const { complaints, intake, lifecycle } = deps;
  const now = deps.now ?? (() => new Date());

  const forms = {
    powerOutage: {
      po_full_name: validateFullName,
      po_address: validateAddress,
      po_contact_number: validatePhone,
    },
    meterConcern: {
      mc_account_no: (v: string) => validateAccountNumber(v, (acct) => complaints.accountExists(acct)),
      mc_full_name: validateFullName,
      mc_address: validateAddress,
      mc_contact_number: validatePhone,
      mc_meter_concern: validateMeterConcern,
    },
    talkToAgent: {
      tta_full_name: validateFullName,
      tta_address: validateAddress,
      tta_contact_number: validatePhone,
      tta_concern: validateAgentConcern,
    },
    followUp: {
      fr_job_order_id: validateJobOrderReference,
    },
  } satisfies Record<string, FormDef>;

  // validate_* actions: per-slot feedback, nothing is stored
  const validateForm = (form: FormDef): ActionHandler => async ({ slots }) => {
    const check = await checkForm(form, slots);
    if (check.complete) {
      return { events: Object.entries(check.values).map(([name, value]) => slot(name, value)), responses: [] };
    }
    return { events: check.events, responses: reply(...check.messages) };
  };

  // Submit actions re-run the whole form so a half-valid form never reaches the store
  async function incomplete(form: FormDef, slots: Slots): Promise<ActionResponse | Record<string, string>> {
    const check = await checkForm(form, slots);
    if (check.complete) return check.values;
    const messages = check.missing ? [replies.missingDetails, ...check.messages] : check.messages;
    return { events: check.events, responses: reply(...messages) };
  }

  function isResponse(value: ActionResponse | Record<string, string>): value is ActionResponse {
    return Array.isArray(value.events) && Array.isArray(value.responses);
  }

  const handlers: Record<string, ActionHandler> = {
    validate_power_outage_form: validateForm(forms.powerOutage),
    validate_meter_concern_form: validateForm(forms.meterConcern),
    validate_talk_to_agent_form: validateForm(forms.talkToAgent),
    validate_follow_up_report_form: validateForm(forms.followUp),

    async action_submit_power_outage_form({ senderId, slots }) {
      const checked = await incomplete(forms.powerOutage, slots);
      if (isResponse(checked)) return checked;

      const name = need(checked, 'po_full_name');
      const address = need(checked, 'po_address');
      const contact = need(checked, 'po_contact_number');
      const description = `Power outage reported at ${address}`;

      try {
        const result = await intake.submitOutage(
          {
            customerName: name,
            customerContact: contact,
            address,
            description,
            // the chatbot form has no free-text details to classify
            priority: CHATBOT_OUTAGE_PRIORITY,
            source: 'Chatbot',
            conversationId: senderId,
          },
          { dedup: true },
        );
        const text = result.kind === 'duplicate'
          ? replies.outageDuplicate(name, result.identifier)
          : replies.outageLogged(name, result.complaint.referenceNo ?? result.complaint.displayId, address, contact);
        return { events: clearSlots(forms.powerOutage), responses: reply(text) };
      } catch (err) {
        log.error('Outage report not saved', err, { senderId });
        return { events: [], responses: reply(replies.saveFailed) };
      }
    },

    async action_submit_meter_concern({ senderId, slots }) {
      const checked = await incomplete(forms.meterConcern, slots);
      if (isResponse(checked)) return checked;

      const name = need(checked, 'mc_full_name');
      const referenceNo = generateReferenceNo(now());
      try {
        await intake.submit({
          family: 'meter_concern',
          customerName: name,
          customerContact: need(checked, 'mc_contact_number'),
          address: need(checked, 'mc_address'),
          description: need(checked, 'mc_meter_concern'),
          accountNumber: need(checked, 'mc_account_no'),
          priority: 'MEDIUM',
          source: 'Chatbot',
          referenceNo,
          conversationId: senderId,
        });
        return { events: clearSlots(forms.meterConcern), responses: reply(replies.meterSubmitted(name, referenceNo)) };
      } catch (err) {
        log.error('Meter concern not saved', err, { senderId });
        return { events: [], responses: reply(replies.saveFailed) };
      }
    },

    async action_submit_talk_to_agent_form({ senderId, slots }) {
      const checked = await incomplete(forms.talkToAgent, slots);
      if (isResponse(checked)) return checked;

      const name = need(checked, 'tta_full_name');
      const contact = need(checked, 'tta_contact_number');
      const concern = need(checked, 'tta_concern');
      try {
        const complaint = await intake.submit({
          family: 'agent_queue',
          customerName: name,
          customerContact: contact,
          address: need(checked, 'tta_address'),
          description: concern,
          priority: classifyConcernPriority(concern),
          source: 'Chatbot',
          conversationId: senderId,
        });
        const position = await complaints.queuePosition(complaint.recordId);
        return {
          events: [...clearSlots(forms.talkToAgent), { event: 'pause' }],
          responses: reply(replies.agentRecorded(name, concern, contact), replies.queuePosition(position)),
        };
      } catch (err) {
        log.error('Agent request not saved', err, { senderId });
        return { events: [], responses: reply(replies.saveFailed) };
      }
    },

    async action_submit_follow_up_report_form({ slots }) {
      const checked = await incomplete(forms.followUp, slots);
      if (isResponse(checked)) return checked;

      const ref = need(checked, 'fr_job_order_id');
      const complaint = await complaints.findByReference(ref);
      let text: string;
      if (!complaint) text = replies.followUpNotFound(ref);
      else if (complaint.status === 'RESOLVED') text = replies.followUpResolved(ref);
      else if (complaint.status === 'ASSIGNED' || complaint.status === 'IN_PROGRESS') text = replies.followUpInProgress(complaint.status);
      else text = replies.followUpStatus(ref, complaint.status);
      return { events: clearSlots(forms.followUp), responses: reply(text) };
    },

    async action_serve_next_user() {
      try {
        const [next] = await complaints.queuedAgentRequests();
        if (!next) return { events: [], responses: reply(replies.queueEmpty) };
        await lifecycle.updateStatus('agent_queue', next.recordId, 'RESOLVED', 'chatbot');
        return { events: [], responses: reply(replies.served(next.customerName)) };
      } catch (err) {
        log.error('Serve next user failed', err);
        return { events: [], responses: reply(replies.serveFailed) };
      }
    },

    async action_resume_conversation() {
      return { events: [{ event: 'resume' }], responses: [] };
    },
  };

  return {
    names: Object.keys(handlers),

    async run(body: unknown): Promise<ActionResponse> {
      const parsed = ActionRequestSchema.safeParse(body);
      if (!parsed.success) throw new ValidationError('Invalid action request');
      const request = parsed.data;

      const handler = handlers[request.next_action];
      if (!handler) throw new ValidationError(`Unknown action: ${request.next_action}`);

      const senderId = request.sender_id || request.tracker.sender_id || '';
      log.debug('Running action', { action: request.next_action, senderId });
      return handler({ senderId, slots: request.tracker.slots });
    },
  };
}
