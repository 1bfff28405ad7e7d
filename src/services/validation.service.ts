export type Validation<T = string> = { ok: true; value: T } | { ok: false; message: string };

const ok = <T>(value: T): Validation<T> => ({ ok: true, value });
const fail = (message: string): Validation<never> => ({ ok: false, message });

export const LOCALITY_KEYWORDS: readonly string[] = ['brgy', 'purok', 'street', 'city', 'blk'];

// Service-area towns; spelling variants included
export const SERVICE_AREA_TOWNS: readonly string[] = [
  'tubungan', 'alimodian', 'cabatuan', 'guimbal', 'igbaras', 'leganes', 'leon',
  'miag-ao', 'miagao', 'oton', 'pavia', 'san joaquin', 'san miguel',
  'sta. barbara', 'sta barbara', 'tigbauan',
];

export const METER_CONCERN_KEYWORDS: readonly string[] = [
  'no display', 'faded reading', 'burned', 'not rotating', 'stuck up',
  'broken', 'tilting', 'defective', 'damaged', 'malfunction',
];

// Menu shortcuts offered by the talk-to-agent dialogue
export const AGENT_CONCERN_MENU: Readonly<Record<string, string>> = {
  '1': 'no electricity',
  '2': 'emergency',
  '3': 'billing issue',
  '4': 'new connection',
  '5': 'follow-up',
  '6': 'transfer or disconnection',
  '7': 'others',
};

export const MESSAGES = {
  name: '❌ Please enter a valid full name (e.g., Juan Dela Cruz).',
  phone: '❌ The contact number is invalid.\n📌 It must be an 11-digit number starting with *09*.\n🔄 Example: *09123456789*',
  address:
    '❌ Please provide a more detailed address with your barangay and town (e.g., Brgy. Bacan, Cabatuan, Iloilo).',
  accountFormat: '❌ Invalid account number.\n🔄 Please enter a valid number (6–12 digits).',
  accountUnknown: '❌ This account number does not exist in our records. Please double-check.',
  meterConcern: "❌ Sorry, that's not a valid meter concern. Please try again.",
  jobOrder: '❗ The Job Order Number you entered seems invalid.\nPlease make sure it looks like this format: `JO-YYYYMMDD-XXXX`',
  agentConcern: "❌ Please describe your concern in more detail (e.g., 'No electricity', 'Billing issue').",
} as const;

const NAME_CHAR = /^[\p{L}.]$/u;

export function validateFullName(raw: string | null | undefined): Validation {
  const name = (raw ?? '').trim();
  const tokens = name.split(/\s+/).filter(Boolean);
  const chars = [...name.replace(/\s+/g, '')];
  if (tokens.length >= 2 && chars.every((c) => NAME_CHAR.test(c))) {
    return ok(tokens.join(' '));
  }
  return fail(MESSAGES.name);
}

export function validatePhone(raw: string | null | undefined): Validation {
  const phone = (raw ?? '').trim();
  return /^09\d{9}$/.test(phone) ? ok(phone) : fail(MESSAGES.phone);
}

export function validateAddress(raw: string | null | undefined): Validation {
  const address = (raw ?? '').trim();
  const lowered = address.toLowerCase();
  const hasLocality = LOCALITY_KEYWORDS.some((kw) => lowered.includes(kw));
  const hasTown = SERVICE_AREA_TOWNS.some((town) => lowered.includes(town));
  if (lowered.length >= 10 && hasLocality && hasTown) return ok(address);
  return fail(MESSAGES.address);
}

export function validateAccountFormat(raw: string | null | undefined): Validation {
  const accountNo = (raw ?? '').trim();
  return /^\d{6,12}$/.test(accountNo) ? ok(accountNo) : fail(MESSAGES.accountFormat);
}

/** Format check, then a lookup against the consumer account registry. */
export async function validateAccountNumber(
  raw: string | null | undefined,
  accountExists: (accountNo: string) => Promise<boolean>,
): Promise<Validation> {
  const format = validateAccountFormat(raw);
  if (!format.ok) return format;
  return (await accountExists(format.value)) ? format : fail(MESSAGES.accountUnknown);
}

// Normalizes to the first matching keyword
export function validateMeterConcern(raw: string | null | undefined): Validation {
  const lowered = (raw ?? '').trim().toLowerCase();
  const keyword = METER_CONCERN_KEYWORDS.find((kw) => lowered.includes(kw));
  return keyword ? ok(keyword) : fail(MESSAGES.meterConcern);
}

export function validateJobOrderReference(raw: string | null | undefined): Validation {
  const ref = (raw ?? '').trim().toUpperCase();
  return /^JO-\d{8}-\d{4}$/.test(ref) ? ok(ref) : fail(MESSAGES.jobOrder);
}

export function validateAgentConcern(raw: string | null | undefined): Validation {
  const value = (raw ?? '').trim().toLowerCase();
  const mapped = AGENT_CONCERN_MENU[value];
  if (mapped) return ok(mapped);
  return value.length >= 5 ? ok(value) : fail(MESSAGES.agentConcern);
}
