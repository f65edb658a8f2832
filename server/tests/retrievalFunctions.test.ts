import { EventChannel } from '../src/core/eventChannel';
import { ChannelActivityListener } from '../src/core/activityListener';
import { callFunction } from '../src/tools/functionCalls';
import { buildRetrievalFunctions } from '../src/tools/retrievalFunctions';
import { AzureSearchClient, cleanText, renderDocument } from '../src/tools/searchClient';
import { drainEvents, fakeSearch, silenceLogs } from './fakes';

beforeEach(() => {
  jest.restoreAllMocks();
  silenceLogs();
});

function functions(accounts = fakeSearch('target-accounts', 'Panda Health docs.')) {
  return buildRetrievalFunctions({
    sales: fakeSearch('sales-methodology', ''),
    accounts,
    user: fakeSearch('user-company', new Error('403 Forbidden')),
  });
}

function find(name: string) {
  const fn = functions().find((candidate) => candidate.name === name);
  if (!fn) {
    throw new Error(`missing ${name}`);
  }
  return fn;
}

const signal = new AbortController().signal;

// ─── Retrieval functions ────────────────────────────────────────────────────

describe('buildRetrievalFunctions', () => {
  test('declares the three lookups with a required query', () => {
    const declared = functions();

    expect(declared.map((fn) => fn.name)).toEqual(['get_sales_docs', 'get_customer_docs', 'get_user_docs']);
    expect(declared.every((fn) => fn.parameters.required.includes('query'))).toBe(true);
  });

  test('passes the trimmed query to the index', async () => {
    const accounts = fakeSearch('target-accounts', 'Panda Health docs.');
    const fn = functions(accounts)[1];

    expect(await fn.execute({ query: '  Panda Health ' }, signal)).toBe('Panda Health docs.');
    expect(accounts.queries).toEqual(['Panda Health']);
  });

  test('reports input errors without searching', async () => {
    expect(await find('get_customer_docs').execute({ query: '' }, signal)).toBe(
      'Input error: The query must be a non-empty string.',
    );
    expect(await find('get_customer_docs').execute({}, signal)).toBe(
      'Input error: The query must be a non-empty string.',
    );
  });

  test('reports an empty index result as text', async () => {
    expect(await find('get_sales_docs').execute({ query: 'discovery' }, signal)).toBe(
      'No relevant documents found in the sales index.',
    );
  });

  test('reports lookup failures as text', async () => {
    expect(await find('get_user_docs').execute({ query: 'Acme' }, signal)).toBe(
      'An error occurred while retrieving documents from the user index: 403 Forbidden',
    );
  });
});

// ─── Function dispatch ──────────────────────────────────────────────────────

describe('callFunction', () => {
  test('reports an unknown function as its result', async () => {
    const channel = new EventChannel('t-1');
    const listener = new ChannelActivityListener(channel);

    const result = await callFunction(functions(), 'c-1', 'get_weather', '{"city":"Oslo"}', listener, signal);
    channel.close();

    expect(result).toBe('{"error":"Unknown function: get_weather"}');
    expect(await drainEvents(channel)).toEqual([
      { type: 'function_call', function_name: 'get_weather', arguments: { city: 'Oslo' } },
      { type: 'function_result', function_name: 'get_weather', result: '{"error":"Unknown function: get_weather"}' },
    ]);
  });
});

// ─── Azure Search client ────────────────────────────────────────────────────

describe('AzureSearchClient', () => {
  const client = new AzureSearchClient({
    endpoint: 'https://search.example.test',
    apiKey: 'test-secret',
    apiVersion: '2024-07-01',
    indexName: 'target-accounts',
    top: 3,
  });

  test('posts a simple query and renders each hit', async () => {
    const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          value: [
            { document_title: 'Panda Health 10-K', content_text: 'Revenue   grew\n\n12%.' },
            { content: 'Untitled note.' },
            { other: 'ignored' },
          ],
        }),
        { status: 200 },
      ),
    );

    const text = await client.search('Panda Health');

    expect(text).toBe('Panda Health 10-K\nRevenue grew 12%.\n\nUntitled note.');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://search.example.test/indexes/target-accounts/docs/search?api-version=2024-07-01');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'api-key': 'test-secret' });
    expect(init?.body).toBe('{"search":"Panda Health","top":3,"queryType":"simple"}');
  });

  test('returns an empty string when nothing matched', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('{"value":[]}', { status: 200 }));

    expect(await client.search('nothing')).toBe('');
  });

  test('throws on a non-ok response', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('index not found', { status: 404 }));

    await expect(client.search('Panda Health')).rejects.toThrow('Azure Search error 404: index not found');
  });
});

describe('renderDocument', () => {
  test('falls back through title and content fields', () => {
    expect(renderDocument({ sourcefile: 'deck.pdf', chunk: ' slide  one ' })).toBe('deck.pdf\nslide one');
    expect(renderDocument({ title: 'Only a title' })).toBe('Only a title');
    expect(renderDocument({})).toBe('');
  });

  test('cleanText collapses whitespace', () => {
    expect(cleanText('  a \n\t b  ')).toBe('a b');
  });
});
