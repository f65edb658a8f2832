import { PayloadTooLargeError, RequestValidationError } from '../src/core/errors';
import {
  content,
  functionCall,
  functionResult,
  intermediate,
  parseSalesRequest,
  streamComplete,
  streamError,
  threadInfo,
} from '../src/core/events';

const MAX_BYTES = 16_384;

function body(fields: Record<string, unknown>): string {
  return JSON.stringify({
    query: 'What should I lead with?',
    user_company: 'Acme',
    target_account: 'Panda Health',
    ...fields,
  });
}

describe('parseSalesRequest', () => {
  test('accepts a minimal request and starts a new thread', () => {
    const result = parseSalesRequest(body({}), MAX_BYTES);

    expect(result.error).toBeUndefined();
    expect(result.request).toEqual({
      query: 'What should I lead with?',
      threadId: undefined,
      userCompany: 'Acme',
      targetAccount: 'Panda Health',
      demandStage: undefined,
      additionalInstructions: undefined,
    });
  });

  test('trims optional fields and reads the request id', () => {
    const result = parseSalesRequest(
      body({ thread_id: '  thread-1 ', demand_stage: ' Interest ', additional_instructions: ' Be brief. ', request_id: ' r-1 ' }),
      MAX_BYTES,
    );

    expect(result.requestId).toBe('r-1');
    expect(result.request?.threadId).toBe('thread-1');
    expect(result.request?.demandStage).toBe('Interest');
    expect(result.request?.additionalInstructions).toBe('Be brief.');
  });

  test('accepts threadId as an alias of thread_id', () => {
    expect(parseSalesRequest(body({ threadId: 'thread-2' }), MAX_BYTES).request?.threadId).toBe('thread-2');
  });

  test('treats an empty thread id as a new thread', () => {
    expect(parseSalesRequest(body({ thread_id: '   ' }), MAX_BYTES).request?.threadId).toBeUndefined();
  });

  test('rejects bodies that are not JSON objects', () => {
    expect(parseSalesRequest('{nope', MAX_BYTES).error?.message).toBe('Body must be valid JSON.');
    expect(parseSalesRequest('[1,2]', MAX_BYTES).error?.message).toBe('Body must be a JSON object.');
    expect(parseSalesRequest('"text"', MAX_BYTES).error?.message).toBe('Body must be a JSON object.');
  });

  test.each([
    ['query', 'query must be a non-empty string.'],
    ['user_company', 'user_company must be a non-empty string.'],
    ['target_account', 'target_account must be a non-empty string.'],
  ])('rejects a blank %s', (field, message) => {
    const result = parseSalesRequest(body({ [field]: '  ' }), MAX_BYTES);

    expect(result.request).toBeUndefined();
    expect(result.error).toBeInstanceOf(RequestValidationError);
    expect(result.error?.message).toBe(message);
    expect(result.error?.statusCode).toBe(400);
  });

  test('rejects a non-string thread id', () => {
    expect(parseSalesRequest(body({ thread_id: 42 }), MAX_BYTES).error?.message).toBe('thread_id must be a string.');
  });

  test('rejects an overlong thread id', () => {
    const result = parseSalesRequest(body({ thread_id: 'x'.repeat(129) }), MAX_BYTES);
    expect(result.error?.message).toBe('thread_id must be at most 128 characters.');
  });

  test('rejects non-string optional fields', () => {
    expect(parseSalesRequest(body({ demand_stage: 3 }), MAX_BYTES).error?.message).toBe('demand_stage must be a string.');
  });

  test('rejects oversized bodies before parsing', () => {
    const result = parseSalesRequest(body({ additional_instructions: 'x'.repeat(200) }), 64);

    expect(result.error).toBeInstanceOf(PayloadTooLargeError);
    expect(result.error?.statusCode).toBe(413);
  });
});

describe('event factories', () => {
  test('build the wire shapes', () => {
    expect(threadInfo('SalesAssistant', 't-1')).toEqual({ type: 'thread_info', agent_name: 'SalesAssistant', thread_id: 't-1' });
    expect(functionCall('get_sales_docs', { query: 'q' })).toEqual({
      type: 'function_call',
      function_name: 'get_sales_docs',
      arguments: { query: 'q' },
    });
    expect(functionResult('get_sales_docs', 'docs')).toEqual({ type: 'function_result', function_name: 'get_sales_docs', result: 'docs' });
    expect(content('hi')).toEqual({ type: 'content', content: 'hi' });
    expect(intermediate('looking')).toEqual({ type: 'intermediate', content: 'looking' });
    expect(streamError('boom')).toEqual({ type: 'error', error: 'boom' });
    expect(streamComplete()).toEqual({ type: 'stream_complete' });
  });
});
