import type { Priority } from '../types/index.js';

// Structured incident codes from the web form that are critical regardless of text
export const CRITICAL_INCIDENT_TYPES: readonly string[] = ['fallen_wire', 'fire_hazard', 'transformer_issue'];

export const CRITICAL_KEYWORDS: readonly string[] = [
  'fire', 'explosion', 'burning', 'smoke', 'accident', 'fallen wire', 'electric shock',
  'live wire', 'transformer burst', 'emergency', 'danger', 'hazard', 'sparking',
  'exposed wire', 'electrocuted', 'injured', 'death', 'pole down', 'wire down',
  'short circuit', 'arcing', 'flames', 'fallen', 'sunog', 'delikado',
];

export const OUTAGE_KEYWORDS: readonly string[] = [
  'no electricity', 'power outage', 'outage', 'blackout', 'no power', 'brownout', 'walang kuryente',
];

export const BILLING_KEYWORDS: readonly string[] = ['billing', 'bill', 'payment', 'follow-up', 'follow up'];

interface Rule {
  keywords: readonly string[];
  priority: Priority;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => text.includes(kw));
}

function matchRules(text: string, incidentType: string | null | undefined, rules: Rule[], fallback: Priority): Priority {
  if (incidentType && CRITICAL_INCIDENT_TYPES.includes(incidentType.trim().toLowerCase())) {
    return 'CRITICAL';
  }
  const lowered = (text || '').toLowerCase();
  for (const rule of rules) {
    if (containsAny(lowered, rule.keywords)) return rule.priority;
  }
  return fallback;
}

/**
 * Outage reports: anything that is not an emergency is HIGH.
 * MEDIUM and LOW never come out of this classifier.
 */
export function classifyOutagePriority(text: string, incidentType?: string | null): Priority {
  return matchRules(text, incidentType, [{ keywords: CRITICAL_KEYWORDS, priority: 'CRITICAL' }], 'HIGH');
}

/** Four-tier classifier for free-text concerns (agent requests). */
export function classifyConcernPriority(text: string, incidentType?: string | null): Priority {
  return matchRules(
    text,
    incidentType,
    [
      { keywords: CRITICAL_KEYWORDS, priority: 'CRITICAL' },
      { keywords: OUTAGE_KEYWORDS, priority: 'HIGH' },
      { keywords: BILLING_KEYWORDS, priority: 'MEDIUM' },
    ],
    'LOW',
  );
}

// Keywords the SMS channel treats as emergencies (includes local-language terms)
export const SMS_CRITICAL_KEYWORDS: readonly string[] = [
  'fire', 'emergency', 'danger', 'explosion', 'accident', 'fallen wire', 'live wire', 'sunog', 'delikado',
];

export function classifySmsPriority(text: string): Priority {
  return matchRules(text, null, [{ keywords: SMS_CRITICAL_KEYWORDS, priority: 'CRITICAL' }], 'HIGH');
}
