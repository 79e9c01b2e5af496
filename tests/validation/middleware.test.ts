import { describe, expect, jest, test } from '@jest/globals';
import { ErrorLogger } from '../../src/errors/logger';
import { ValidtreeError } from '../../src/errors/validtree-error';
import { MessageCatalog } from '../../src/error-tree/message-catalog';
import { v } from '../../src/schema/builders';
import { validateBody } from '../../src/validation/middleware';

const Greeting = v.object('Greeting', { name: v.string().minLength(1) });

describe('validateBody', () => {
  test('passes the validated value and extra arguments to the handler', async () => {
    const handler = jest.fn(async (input: { name: string }, prefix: string) => `${prefix} ${input.name}`);
    const wrapped = validateBody(Greeting)(handler);

    const outcome = await wrapped('{"name":"world"}', 'Hello');

    expect(outcome).toEqual({ ok: true, result: 'Hello world' });
    expect(handler).toHaveBeenCalledWith({ name: 'world' }, 'Hello');
  });

  test('accepts a pending body', async () => {
    const wrapped = validateBody(Greeting)((input) => input.name.toUpperCase());

    await expect(wrapped(Promise.resolve('{"name":"ada"}'))).resolves.toEqual({ ok: true, result: 'ADA' });
  });

  test('structural failures become a client error without calling the handler', async () => {
    const handler = jest.fn((input: { name: string }) => input.name);
    const outcome = await validateBody(Greeting)(handler)('{"name":7}');

    expect(handler).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    expect(outcome.ok ? undefined : outcome.response).toEqual({
      status: 400,
      body: { errors: [{ path: '/name', message: 'must be string' }] },
    });
  });

  test('constraint failures are flattened and can be localized', async () => {
    const translator = MessageCatalog.fromRecord({ 'min-length': 'mindestens {minLength} Zeichen' });
    const wrapped = validateBody(Greeting, { translator })((input) => input.name);

    const outcome = await wrapped('{"name":""}');

    expect(outcome.ok ? undefined : outcome.response.body).toEqual({
      errors: [{ path: '/name', message: 'mindestens 1 Zeichen' }],
    });
    expect(outcome.ok ? undefined : outcome.error.kind).toBe('validation');
  });

  test('malformed bodies get the generic message', async () => {
    const outcome = await validateBody(Greeting)((input) => input.name)('not json');

    expect(outcome.ok ? undefined : outcome.response.body).toEqual({
      errors: [{ path: '', message: 'invalid request body' }],
    });
  });

  test('a body that cannot be read is logged and rethrown', async () => {
    const sink = {
      warn: jest.fn<(message: string) => void>(),
      error: jest.fn<(message: string) => void>(),
    };
    const wrapped = validateBody(Greeting, { logger: new ErrorLogger(sink) })((input) => input.name);

    const failure = wrapped(Promise.reject(new Error('socket closed')));

    await expect(failure).rejects.toBeInstanceOf(ValidtreeError);
    await expect(failure).rejects.toMatchObject({ message: 'socket closed', category: 'io' });
    expect(sink.error).toHaveBeenCalledTimes(1);
  });
});
