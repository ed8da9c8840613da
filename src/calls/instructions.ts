/** Telephony-neutral call instructions, rendered to markup by the transport. */
export type CallInstruction =
  | { kind: 'say'; text: string }
  | { kind: 'gather'; actionUrl: string }
  | { kind: 'redirect'; url: string }
  | { kind: 'hangup' };

export const TELEPHONY_PATHS = {
  voice: '/telephony/voice',
  gather: '/telephony/gather',
  silence: '/telephony/silence',
  outbound: '/telephony/outbound',
  events: '/telephony/events',
} as const;

export type TelephonyPath = keyof typeof TELEPHONY_PATHS;

export function webhookUrl(publicBaseUrl: string, path: TelephonyPath): string {
  return `${publicBaseUrl.replace(/\/$/, '')}${TELEPHONY_PATHS[path]}`;
}

export const say = (text: string): CallInstruction => ({ kind: 'say', text });
export const gather = (actionUrl: string): CallInstruction => ({ kind: 'gather', actionUrl });
export const redirect = (url: string): CallInstruction => ({ kind: 'redirect', url });
export const hangup = (): CallInstruction => ({ kind: 'hangup' });
