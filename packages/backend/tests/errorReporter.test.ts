import { ErrorReport } from '@testprojects/shared';
import { DeliveryResponse, ErrorReporter, reportStartupFailure } from '../src/reporting/errorReporter';
import { respondWith, sentReport } from './helpers/transportStub';

const ENDPOINT = 'https://errors.example.com/report';

const report: ErrorReport = {
  boardId: 'abc123',
  timestamp: '2026-01-02T03:04:05.000Z',
  file: '/srv/app/src/app.ts',
  line: 12,
  stackTrace: 'Error: boom\n    at /srv/app/src/app.ts:12:3',
  message: 'boom',
  exceptionType: 'Error',
  requestPath: '/api/test/',
  requestMethod: 'GET',
  userAgent: null,
};

describe('ErrorReporter', () => {
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('posts the report to the configured endpoint', async () => {
    const transport = respondWith(200);
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reporter.report(report);
    await reporter.whenIdle();

    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0][0]).toBe(ENDPOINT);
    expect(sentReport(transport)).toEqual(report);
    expect(warnSpy).toHaveBeenCalledWith('[ErrorReporter] Error endpoint response: 200');
  });

  it('returns before the delivery completes', () => {
    let release: () => void = () => {};
    const transport = respondWith(200);
    transport.mockImplementation(
      () => new Promise<DeliveryResponse>((resolve) => {
        release = () => resolve({ status: 200, data: '' });
      })
    );
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    expect(reporter.report(report)).toBeUndefined();
    expect(transport).toHaveBeenCalledTimes(1);
    release();
    return reporter.whenIdle();
  });

  it('logs a non-success response with its body', async () => {
    const transport = respondWith(502, 'bad gateway');
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reporter.report(report);
    await reporter.whenIdle();

    expect(errorSpy).toHaveBeenCalledWith('[ErrorReporter] Error endpoint response: 502 - bad gateway');
  });

  it('serializes a structured error body', async () => {
    const transport = respondWith(400, { errors: ['boardId is invalid'] });
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reporter.report(report);
    await reporter.whenIdle();

    expect(errorSpy).toHaveBeenCalledWith(
      '[ErrorReporter] Error endpoint response: 400 - {"errors":["boardId is invalid"]}'
    );
  });

  it('logs and swallows network failures', async () => {
    const failure = new Error('connect ECONNREFUSED');
    const transport = respondWith(200);
    transport.mockRejectedValue(failure);
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reporter.report(report);
    await expect(reporter.whenIdle()).resolves.toBeUndefined();

    expect(transport).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[ErrorReporter] Failed to send error to endpoint:', failure);
  });

  it('skips delivery when no endpoint is configured', async () => {
    const transport = respondWith(200);
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: null }, transport);

    reporter.report(report);
    await reporter.whenIdle();

    expect(reporter.enabled).toBe(false);
    expect(transport).not.toHaveBeenCalled();
  });
});

describe('reportStartupFailure', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sends a STARTUP report tagged with the configured board id', async () => {
    const transport = respondWith(200);
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reportStartupFailure(new RangeError('port out of range'), { boardId: 'xyz' }, reporter);
    await reporter.whenIdle();

    expect(sentReport(transport)).toEqual(
      expect.objectContaining({
        boardId: 'xyz',
        message: 'port out of range',
        exceptionType: 'RangeError',
        requestPath: 'STARTUP',
        requestMethod: 'STARTUP',
        userAgent: 'STARTUP_ERROR',
      })
    );
  });

  it('sends an empty board id when BOARD_ID is unset', async () => {
    const transport = respondWith(200);
    const reporter = new ErrorReporter({ runtimeErrorEndpointUrl: ENDPOINT }, transport);

    reportStartupFailure(new Error('boom'), { boardId: null }, reporter);
    await reporter.whenIdle();

    expect(sentReport(transport)).toEqual(expect.objectContaining({ boardId: '' }));
  });
});
