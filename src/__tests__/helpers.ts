import * as fs from 'fs';
import * as path from 'path';
import type { Transport } from '../httpClient.js';

export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  form?: Record<string, string>;
  timeoutMs: number;
}

/**
 * In-process stand-in for the timetable endpoint.
 * `respond` picks the page for each request; every request is recorded.
 */
export function fakeTransport(respond: (request: RecordedRequest) => string | Promise<string>) {
  const requests: RecordedRequest[] = [];
  const transport: Transport = {
    async get(url, timeoutMs) {
      const request: RecordedRequest = { method: 'GET', url, timeoutMs };
      requests.push(request);
      return respond(request);
    },
    async post(url, form, timeoutMs) {
      const request: RecordedRequest = { method: 'POST', url, form, timeoutMs };
      requests.push(request);
      return respond(request);
    },
  };
  return { transport, requests };
}
