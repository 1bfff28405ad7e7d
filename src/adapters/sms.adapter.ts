import { logger } from '../lib/logger.js';
import type { Complaint, Family, IssueType, Priority } from '../types/index.js';
import type { IntakeService } from '../services/intake.service.js';
import { classifySmsPriority } from '../services/priority.service.js';

const log = logger.child('[intake/sms]');

// Keyword customers start every message with
export const SMS_KEYWORD = 'ILECO';

const TYPE_ALIASES: Readonly<Record<string, IssueType>> = {
  OUTAGE: 'POWER_OUTAGE',
  POWER: 'POWER_OUTAGE',
  EMERGENCY: 'POWER_OUTAGE',
  BILLING: 'BILLING',
  METER: 'BILLING',
  SERVICE: 'SERVICE',
};

const STANDARD_PATTERN = new RegExp(
  `^${SMS_KEYWORD}\\s+(${Object.keys(TYPE_ALIASES).join('|')})\\s+(.+?)\\s*\\|\\s*(.+?)\\s*\\|\\s*(.+?)\\s*\\|\\s*(.+)`,
  'i',
);
const SIMPLE_PATTERN = new RegExp(`^${SMS_KEYWORD}\\s+(.+)`, 'i');

const OUTAGE_WORDS = ['outage', 'blackout', 'no power', 'brownout', 'walang kuryente'];
const BILLING_WORDS = ['bill', 'billing', 'bayad', 'presyo'];

export const SMS_HELP_MESSAGE =
  'Invalid format. Please use:\n' +
  `${SMS_KEYWORD} [TYPE] [NAME] | [ADDRESS] | [CONTACT] | [DETAILS]\n\n` +
  'Example:\n' +
  `${SMS_KEYWORD} OUTAGE Juan Cruz | Brgy. Oton | 09171234567 | No power`;

export const SMS_ERROR_MESSAGE = 'System error. Please try again later.';

export interface ParsedSms {
  issueType: IssueType;
  fullName: string;
  address: string;
  contactNumber: string;
  details: string;
  priority: Priority;
}

const FAMILY_BY_TYPE: Readonly<Record<IssueType, Family>> = {
  POWER_OUTAGE: 'outage_report',
  BILLING: 'meter_concern',
  SERVICE: 'agent_queue',
};

// Capitalizes every letter that follows a non-letter
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

export function detectIssueType(content: string): IssueType {
  const lowered = content.toLowerCase();
  if (OUTAGE_WORDS.some((w) => lowered.includes(w))) return 'POWER_OUTAGE';
  if (BILLING_WORDS.some((w) => lowered.includes(w))) return 'BILLING';
  return 'SERVICE';
}

/** Standard `KEYWORD TYPE name | address | contact | details`, else `KEYWORD free text`. */
export function parseSms(body: string, from: string): ParsedSms | null {
  const text = body.trim().toUpperCase();

  const standard = STANDARD_PATTERN.exec(text);
  if (standard) {
    const [, type = '', name = '', address = '', contact = '', details = ''] = standard;
    const trimmedDetails = details.trim();
    return {
      issueType: TYPE_ALIASES[type.toUpperCase()] ?? 'SERVICE',
      fullName: titleCase(name.trim()),
      address: titleCase(address.trim()),
      contactNumber: contact.trim(),
      details: trimmedDetails,
      priority: classifySmsPriority(trimmedDetails),
    };
  }

  const simple = SIMPLE_PATTERN.exec(text);
  if (simple) {
    const content = (simple[1] ?? '').trim();
    return {
      issueType: detectIssueType(content),
      fullName: 'SMS User',
      address: 'To be verified',
      contactNumber: from,
      details: content,
      priority: classifySmsPriority(content),
    };
  }

  return null;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function twimlMessage(message: string): string {
  return ['<?xml version="1.0" encoding="UTF-8"?>', '<Response>', `<Message>${escapeXml(message)}</Message>`, '</Response>'].join('\n');
}

export function confirmationMessage(complaint: Complaint): string {
  return [
    '✅ Your complaint has been received.',
    `Ref: ${complaint.displayId}`,
    `Type: ${complaint.issueType.replace(/_/g, ' ')}`,
    `Priority: ${complaint.priority}`,
    'We will respond shortly.',
  ].join('\n');
}

export interface InboundSms {
  from: string;
  body: string;
  messageSid?: string;
}

export interface SmsReply {
  status: number;
  twiml: string;
  complaint?: Complaint;
}

export type SmsIntake = ReturnType<typeof createSmsIntake>;

export function createSmsIntake(intake: IntakeService) {
  return {
    async receive(sms: InboundSms): Promise<SmsReply> {
      log.info('Incoming SMS', { from: sms.from, messageSid: sms.messageSid });
      const parsed = parseSms(sms.body, sms.from);
      if (!parsed) {
        return { status: 200, twiml: twimlMessage(SMS_HELP_MESSAGE) };
      }

      try {
        const complaint = await intake.submit({
          family: FAMILY_BY_TYPE[parsed.issueType],
          customerName: parsed.fullName,
          customerContact: parsed.contactNumber,
          address: parsed.address,
          description: parsed.details,
          // billing texts are never emergencies
          priority: parsed.issueType === 'BILLING' ? 'MEDIUM' : parsed.priority,
          source: 'SMS',
          accountNumber: parsed.issueType === 'BILLING' ? 'N/A' : null,
        });
        return { status: 200, twiml: twimlMessage(confirmationMessage(complaint)), complaint };
      } catch (err) {
        log.error('SMS complaint not saved', err, { from: sms.from, messageSid: sms.messageSid });
        return { status: 500, twiml: twimlMessage(SMS_ERROR_MESSAGE) };
      }
    },
  };
}
