import type {
  CommandPayload,
  CyberprobeEvent,
  DecodeResult,
  DnsAnswer,
  DnsMessage,
  HttpHeaders,
  HttpRequest,
  HttpResponse,
  ResponsePayload,
  SipRequest,
  SipResponse,
  SmtpData
} from './types';

type JsonObject = Record<string, unknown>;

export function decodeEvent(payload: Buffer | string | null | undefined): DecodeResult {
  if (payload === null || payload === undefined) {
    return { ok: false, error: 'empty message' };
  }

  const text = typeof payload === 'string' ? payload : payload.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: `invalid json: ${error instanceof Error ? error.message : String(error)}`
    };
  }

  const body = asObject(parsed);

  if (!body) {
    return { ok: false, error: 'event must be an object' };
  }

  return { ok: true, event: readEvent(body) };
}

function readEvent(body: JsonObject): CyberprobeEvent {
  const event: CyberprobeEvent = {
    id: readString(body.id),
    action: readString(body.action),
    device: readString(body.device),
    time: readString(body.time),
    url: readString(body.url),
    src: readStringList(body.src),
    dest: readStringList(body.dest)
  };

  const httpRequest = asObject(body.http_request);
  if (httpRequest) {
    event.http_request = readHttpRequest(httpRequest);
  }

  const httpResponse = asObject(body.http_response);
  if (httpResponse) {
    event.http_response = readHttpResponse(httpResponse);
  }

  const ftpCommand = asObject(body.ftp_command);
  if (ftpCommand) {
    event.ftp_command = readCommand(ftpCommand);
  }

  const ftpResponse = asObject(body.ftp_response);
  if (ftpResponse) {
    event.ftp_response = readResponse(ftpResponse);
  }

  const dnsMessage = asObject(body.dns_message);
  if (dnsMessage) {
    event.dns_message = readDnsMessage(dnsMessage);
  }

  const sipRequest = asObject(body.sip_request);
  if (sipRequest) {
    event.sip_request = readSipRequest(sipRequest);
  }

  const sipResponse = asObject(body.sip_response);
  if (sipResponse) {
    event.sip_response = readSipResponse(sipResponse);
  }

  const smtpCommand = asObject(body.smtp_command);
  if (smtpCommand) {
    event.smtp_command = readCommand(smtpCommand);
  }

  const smtpResponse = asObject(body.smtp_response);
  if (smtpResponse) {
    event.smtp_response = readResponse(smtpResponse);
  }

  const smtpData = asObject(body.smtp_data);
  if (smtpData) {
    event.smtp_data = readSmtpData(smtpData);
  }

  return event;
}

function readHttpRequest(value: JsonObject): HttpRequest {
  return {
    method: readString(value.method),
    header: readHeaders(value.header)
  };
}

function readHttpResponse(value: JsonObject): HttpResponse {
  return {
    code: readInteger(value.code),
    status: readStatus(value.status),
    header: readHeaders(value.header)
  };
}

function readCommand(value: JsonObject): CommandPayload {
  return { command: readString(value.command) };
}

function readResponse(value: JsonObject): ResponsePayload {
  return {
    status: readStatus(value.status),
    text: readText(value.text)
  };
}

function readDnsMessage(value: JsonObject): DnsMessage {
  return {
    type: readString(value.type),
    query: readQueries(value.query),
    answer: readAnswers(value.answer)
  };
}

function readSipRequest(value: JsonObject): SipRequest {
  return {
    method: readString(value.method),
    from: readString(value.from),
    to: readString(value.to)
  };
}

function readSipResponse(value: JsonObject): SipResponse {
  return {
    code: readInteger(value.code),
    status: readStatus(value.status),
    from: readString(value.from),
    to: readString(value.to)
  };
}

function readSmtpData(value: JsonObject): SmtpData {
  const to = value.to;

  return {
    from: readString(value.from),
    to: typeof to === 'string' ? [to] : readOptionalStringList(to)
  };
}

function readHeaders(value: unknown): HttpHeaders | undefined {
  const object = asObject(value);

  if (!object) {
    return;
  }

  const headers: HttpHeaders = {};

  for (const [name, headerValue] of Object.entries(object)) {
    if (typeof headerValue === 'string') {
      headers[name] = headerValue;
    }
  }

  return headers;
}

// Probes emit either bare names or { name, type, class } objects.
function readQueries(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return;
  }

  const queries: string[] = [];

  for (const entry of value) {
    if (typeof entry === 'string') {
      queries.push(entry);
      continue;
    }

    const name = readString(asObject(entry)?.name);
    if (name !== undefined) {
      queries.push(name);
    }
  }

  return queries;
}

function readAnswers(value: unknown): DnsAnswer[] | undefined {
  if (!Array.isArray(value)) {
    return;
  }

  const answers: DnsAnswer[] = [];

  for (const entry of value) {
    const object = asObject(entry);
    if (!object) {
      continue;
    }

    const answer: DnsAnswer = {};
    const name = readString(object.name);
    const address = readString(object.address);

    if (name !== undefined) {
      answer.name = name;
    }
    if (address !== undefined) {
      answer.address = address;
    }

    answers.push(answer);
  }

  return answers;
}

function readText(value: unknown): string[] | undefined {
  if (typeof value === 'string') {
    return [value];
  }

  return readOptionalStringList(value);
}

function readStatus(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return;
}

function readInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }

  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }

  return;
}

function readStringList(value: unknown): string[] {
  return readOptionalStringList(value) ?? [];
}

function readOptionalStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return;
  }

  return value.filter((entry): entry is string => typeof entry === 'string');
}

function asObject(value: unknown): JsonObject | undefined {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return;
  }

  return value as JsonObject;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
