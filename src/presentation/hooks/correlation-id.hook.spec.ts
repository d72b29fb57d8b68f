import type { IncomingHttpHeaders } from 'http';
import { CORRELATION_ID_HEADER, correlationIdHook, resolveCorrelationId } from './correlation-id.hook';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('resolveCorrelationId', () => {
  it('should keep a provided id', () => {
    expect(resolveCorrelationId('corr-1')).toBe('corr-1');
  });

  it('should take the first value of a repeated header', () => {
    expect(resolveCorrelationId(['corr-1', 'corr-2'])).toBe('corr-1');
  });

  it.each([undefined, '', '   '])('should generate a UUID for %p', (header) => {
    expect(resolveCorrelationId(header)).toMatch(UUID_PATTERN);
  });
});

describe('correlationIdHook', () => {
  it('should echo the incoming id and call done', () => {
    const headers: IncomingHttpHeaders = { [CORRELATION_ID_HEADER]: 'corr-hook' };
    const request = { headers };
    const reply = { header: jest.fn() };
    const done = jest.fn();

    correlationIdHook(request, reply, done);

    expect(reply.header).toHaveBeenCalledWith('x-correlation-id', 'corr-hook');
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should store a generated id on the request and the reply', () => {
    const headers: IncomingHttpHeaders = {};
    const request = { headers };
    const reply = { header: jest.fn() };

    correlationIdHook(request, reply, jest.fn());

    const generated = request.headers[CORRELATION_ID_HEADER];
    expect(generated).toMatch(UUID_PATTERN);
    expect(reply.header).toHaveBeenCalledWith('x-correlation-id', generated);
  });
});
