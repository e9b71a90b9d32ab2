import { isEventAction, type CyberprobeEvent, type EventAction } from '../events/types';
import { buildHeaderRow } from './headers';
import type { EventRow } from './types';

type AddressDirection = 'src' | 'dest';

export function mapEvent(event: CyberprobeEvent): EventRow {
  const row: EventRow = {};

  if (event.id) {
    row.id = event.id;
  }
  if (event.action) {
    row.action = event.action;
  }
  if (event.device) {
    row.device = event.device;
  }
  if (event.time) {
    row.time = event.time;
  }

  if (event.action && isEventAction(event.action)) {
    applyActionFields(row, event, event.action);
  }

  if (event.url) {
    row.url = event.url;
  }

  applyAddresses(row, event.src, 'src');
  applyAddresses(row, event.dest, 'dest');

  return row;
}

function applyActionFields(row: EventRow, event: CyberprobeEvent, action: EventAction): void {
  switch (action) {
    case 'http_request': {
      const request = event.http_request;
      if (request?.method !== undefined) {
        row.method = request.method;
      }
      row.header = buildHeaderRow(request?.header, event.http_response?.header);
      return;
    }
    case 'http_response': {
      const response = event.http_response;
      if (response?.status !== undefined) {
        row.status = response.status;
      }
      if (response?.code !== undefined) {
        row.code = response.code;
      }
      row.header = buildHeaderRow(event.http_request?.header, response?.header);
      return;
    }
    case 'ftp_command':
      if (event.ftp_command?.command !== undefined) {
        row.command = event.ftp_command.command;
      }
      return;
    case 'ftp_response':
      if (event.ftp_response?.status !== undefined) {
        row.status = event.ftp_response.status;
      }
      if (event.ftp_response?.text !== undefined) {
        row.text = event.ftp_response.text;
      }
      return;
    case 'dns_message': {
      const message = event.dns_message;
      if (!message) {
        return;
      }
      if (message.query && message.query.length > 0) {
        row.query = message.query;
      }
      if (message.answer && message.answer.length > 0) {
        row.answer = message.answer;
      }
      row.type = message.type ?? '';
      return;
    }
    case 'sip_request': {
      const request = event.sip_request;
      if (request?.method !== undefined) {
        row.method = request.method;
      }
      if (request?.from !== undefined) {
        row.from = request.from;
      }
      if (request?.to !== undefined) {
        row.to = [request.to];
      }
      return;
    }
    case 'sip_response': {
      const response = event.sip_response;
      if (response?.code !== undefined) {
        row.code = response.code;
      }
      if (response?.status !== undefined) {
        row.status = response.status;
      }
      if (response?.from !== undefined) {
        row.from = response.from;
      }
      if (response?.to !== undefined) {
        row.to = [response.to];
      }
      return;
    }
    case 'smtp_command':
      if (event.smtp_command?.command !== undefined) {
        row.command = event.smtp_command.command;
      }
      return;
    case 'smtp_response':
      if (event.smtp_response?.status !== undefined) {
        row.status = event.smtp_response.status;
      }
      if (event.smtp_response?.text !== undefined) {
        row.text = event.smtp_response.text;
      }
      return;
    case 'smtp_data':
      if (event.smtp_data?.from !== undefined) {
        row.from = event.smtp_data.from;
      }
      if (event.smtp_data?.to !== undefined) {
        row.to = event.smtp_data.to;
      }
      return;
    case 'icmp':
    case 'ntp_timestamp':
    case 'ntp_control':
    case 'ntp_private':
      return;
    default:
      return assertNever(action);
  }
}

function applyAddresses(row: EventRow, entries: string[], direction: AddressDirection): void {
  for (const entry of entries) {
    const separator = entry.indexOf(':');
    const addressClass = separator === -1 ? entry : entry.slice(0, separator);
    const address = separator === -1 ? '' : entry.slice(separator + 1);

    switch (addressClass) {
      case 'ipv4':
        if (direction === 'src') {
          row.ipv4_src = address;
        } else {
          row.ipv4_dest = address;
        }
        break;
      case 'tcp':
        if (direction === 'src') {
          row.tcp_src = address;
        } else {
          row.tcp_dest = address;
        }
        break;
      case 'udp':
        if (direction === 'src') {
          row.udp_src = address;
        } else {
          row.udp_dest = address;
        }
        break;
      default:
        break;
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled event action: ${String(value)}`);
}
