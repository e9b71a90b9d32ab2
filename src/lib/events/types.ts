export const EVENT_ACTIONS = [
  'http_request',
  'http_response',
  'ftp_command',
  'ftp_response',
  'icmp',
  'dns_message',
  'sip_request',
  'sip_response',
  'smtp_command',
  'smtp_response',
  'smtp_data',
  'ntp_timestamp',
  'ntp_control',
  'ntp_private'
] as const;

export type EventAction = (typeof EVENT_ACTIONS)[number];

const EVENT_ACTION_SET: ReadonlySet<string> = new Set(EVENT_ACTIONS);

export function isEventAction(value: string): value is EventAction {
  return EVENT_ACTION_SET.has(value);
}

export type HttpHeaders = Record<string, string>;

export type HttpRequest = {
  method?: string;
  header?: HttpHeaders;
};

export type HttpResponse = {
  code?: number;
  status?: string;
  header?: HttpHeaders;
};

export type CommandPayload = {
  command?: string;
};

export type ResponsePayload = {
  status?: string;
  text?: string[];
};

export type DnsAnswer = {
  name?: string;
  address?: string;
};

export type DnsMessage = {
  type?: string;
  query?: string[];
  answer?: DnsAnswer[];
};

export type SipRequest = {
  method?: string;
  from?: string;
  to?: string;
};

export type SipResponse = {
  code?: number;
  status?: string;
  from?: string;
  to?: string;
};

export type SmtpData = {
  from?: string;
  to?: string[];
};

/**
 * One decoded probe event. `action` is kept as received so that events with
 * an action outside {@link EVENT_ACTIONS} still load with their common fields.
 */
export type CyberprobeEvent = {
  id?: string;
  action?: string;
  device?: string;
  time?: string;
  url?: string;
  src: string[];
  dest: string[];
  http_request?: HttpRequest;
  http_response?: HttpResponse;
  ftp_command?: CommandPayload;
  ftp_response?: ResponsePayload;
  dns_message?: DnsMessage;
  sip_request?: SipRequest;
  sip_response?: SipResponse;
  smtp_command?: CommandPayload;
  smtp_response?: ResponsePayload;
  smtp_data?: SmtpData;
};

export type DecodeResult =
  | { ok: true; event: CyberprobeEvent }
  | { ok: false; error: string };
