import fs from 'fs';
import path from 'path';
import { createClients, type Clients } from '../../src/clients';
import type { Config } from '../../src/config';
import { stubHttp, type StubResponse } from './stubHttp';

export const BASE = 'https://id.loc.gov';
export const FOOD = 'http://id.loc.gov/authorities/subjects/sh85050184';

export const testConfig: Config = {
  baseUrl: BASE,
  timeoutMs: 1000,
  pageDelayMs: 0,
  searchLimit: 20,
  port: undefined,
  allowedOrigins: undefined,
};

export const foodGraph: unknown = JSON.parse(
  fs.readFileSync(path.join(__dirname, '..', 'fixtures', 'sh85050184.json'), 'utf-8'),
);

export const searchUrl = (query: string): string =>
  `${BASE}/search/?${new URLSearchParams({ format: 'atom', q: query }).toString()}`;

export const atomFeed = (entries: Array<[string, string]>, next?: string): string => `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  ${next ? `<link rel="next" href="${next.replace(/&/g, '&amp;')}"/>` : ''}
  ${entries.map(([title, uri]) => `<entry><title>${title}</title><link href="${uri}"/></entry>`).join('\n')}
</feed>`;

export const stubClients = (
  routes: Record<string, StubResponse>,
  config: Config = testConfig,
): { clients: Clients; requests: ReturnType<typeof stubHttp>['requests'] } => {
  const { http, requests } = stubHttp(routes);
  return { clients: createClients(config, http), requests };
};
