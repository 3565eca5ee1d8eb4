import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createLogger, registerAll } from '../src/registration';
import { BASE, FOOD, atomFeed, foodGraph, searchUrl, stubClients } from './helpers/fixtures';

const routes = {
  [searchUrl('Food')]: {
    data: atomFeed([
      ['Food', FOOD],
      ['Food additives', 'http://id.loc.gov/authorities/subjects/sh85050186'],
    ]),
  },
  [searchUrl('zzyzx')]: { data: atomFeed([]) },
  [FOOD]: { data: foodGraph },
  [`${BASE}/search/`]: {
    data: `<div class="facet-box"><ul>
      <li><a href="?q=cs:http://id.loc.gov/authorities/subjects"><span>LC Subject Headings (LCSH)</span></a></li>
      <li><a href="?q=cs:http://id.loc.gov/authorities/names"><span>LC Name Authority File (LCNAF)</span></a></li>
    </ul></div>`,
  },
};

const textOf = (result: Awaited<ReturnType<Client['callTool']>>): string => {
  const content = result.content;
  if (!Array.isArray(content)) throw new Error('tool result has no content');
  const first: unknown = content[0];
  if (first && typeof first === 'object' && 'text' in first && typeof first.text === 'string') {
    return first.text;
  }
  throw new Error('tool result has no text content');
};

describe('MCP tool registration', () => {
  let client: Client;
  let logLines: string[];

  beforeEach(async () => {
    logLines = [];
    const server = new McpServer({ name: 'idloc-test', version: '0.0.0' });
    const { clients } = stubClients(routes);
    registerAll(server, clients, createLogger((line) => logLines.push(line)));

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      'discover_concept_schemes',
      'get_entity',
      'list_concept_schemes',
      'lucky',
      'resolve_concept_schemes',
      'search',
    ]);
  });

  it('returns framed JSON-LD from get_entity', async () => {
    const result = await client.callTool({ name: 'get_entity', arguments: { uri: FOOD } });

    const doc = JSON.parse(textOf(result));
    expect(doc['@id']).toBe(FOOD);
    expect(doc['skos:prefLabel']).toEqual({ '@language': 'en', '@value': 'Food' });
  });

  it('formats search hits one per line', async () => {
    const result = await client.callTool({ name: 'search', arguments: { query: 'Food', limit: 5 } });

    expect(textOf(result)).toBe(
      `1. Food <${FOOD}>\n2. Food additives <http://id.loc.gov/authorities/subjects/sh85050186>`,
    );
  });

  it('returns the first hit as framed JSON-LD from lucky', async () => {
    const result = await client.callTool({ name: 'lucky', arguments: { query: 'Food' } });

    expect(JSON.parse(textOf(result))['@id']).toBe(FOOD);
  });

  it('answers lucky with a not-found text when nothing matches', async () => {
    const result = await client.callTool({ name: 'lucky', arguments: { query: 'zzyzx' } });

    expect(result.isError).toBeFalsy();
    expect(textOf(result)).toBe('No match found for "zzyzx"');
  });

  it('discovers live concept schemes with cs: values', async () => {
    const result = await client.callTool({ name: 'discover_concept_schemes', arguments: {} });

    expect(JSON.parse(textOf(result))).toEqual({
      'lc-subject-headings-(lcsh)': 'cs:http://id.loc.gov/authorities/subjects',
      'lc-name-authority-file-(lcnaf)': 'cs:http://id.loc.gov/authorities/names',
    });
  });

  it('resolves concept scheme names', async () => {
    const result = await client.callTool({
      name: 'resolve_concept_schemes',
      arguments: { names: ['name-authority', 'subject-headings'] },
    });

    expect(JSON.parse(textOf(result))).toEqual([
      'http://id.loc.gov/authorities/names',
      'http://id.loc.gov/authorities/subjects',
    ]);
  });

  it('turns library errors into isError results and logs them', async () => {
    const result = await client.callTool({
      name: 'resolve_concept_schemes',
      arguments: { names: ['nope'] },
    });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error in resolve_concept_schemes: Concept scheme name(s) don't exist: nope");
    const entry = JSON.parse(logLines[logLines.length - 1]);
    expect(entry).toMatchObject({ tool: 'resolve_concept_schemes', ok: false, input: { names: ['nope'] } });
  });

  it('lists the static registry', async () => {
    const result = await client.callTool({ name: 'list_concept_schemes', arguments: {} });

    const schemes = JSON.parse(textOf(result));
    expect(schemes).toHaveLength(130);
    expect(schemes[0]).toEqual({ name: 'bibframe-instances', uri: 'http://id.loc.gov/resources/instances' });
  });
});
