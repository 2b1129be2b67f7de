import axios from 'axios';
import { ErrorReport } from '@testprojects/shared';
import { AppConfig } from '../config/env';
import { buildErrorReport } from './errorReport';

export const DELIVERY_TIMEOUT_MS = 5000;

export interface DeliveryResponse {
  status: number;
  data: unknown;
}

export type ReportTransport = (endpointUrl: string, report: ErrorReport) => Promise<DeliveryResponse>;

const reportClient = axios.create({
  timeout: DELIVERY_TIMEOUT_MS,
  headers: {
    'Content-Type': 'application/json',
  },
  // Any status is logged, never thrown
  validateStatus: () => true,
});

export const postReport: ReportTransport = async (endpointUrl, report) => {
  const response = await reportClient.post<unknown>(endpointUrl, report, { responseType: 'text' });
  return { status: response.status, data: response.data };
};

/**
 * Fire-and-forget delivery of error reports to RUNTIME_ERROR_ENDPOINT_URL.
 *
 * `report` never waits on the network and never throws. Failed deliveries
 * are logged and dropped; there is no retry and no queue.
 */
export class ErrorReporter {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly config: Pick<AppConfig, 'runtimeErrorEndpointUrl'>,
    private readonly transport: ReportTransport = postReport
  ) {}

  get enabled(): boolean {
    return this.config.runtimeErrorEndpointUrl !== null;
  }

  report(report: ErrorReport): void {
    const endpointUrl = this.config.runtimeErrorEndpointUrl;
    if (!endpointUrl) {
      console.warn('[ErrorReporter] RUNTIME_ERROR_ENDPOINT_URL is not set - skipping error reporting');
      return;
    }

    console.warn(`[ErrorReporter] Sending error to endpoint: ${endpointUrl} (boardId: ${report.boardId || 'NULL'})`);
    const delivery = this.deliver(endpointUrl, report).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /**
   * Resolves once every delivery started so far has settled.
   */
  async whenIdle(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  private async deliver(endpointUrl: string, report: ErrorReport): Promise<void> {
    try {
      const response = await this.transport(endpointUrl, report);

      if (response.status >= 200 && response.status < 300) {
        console.warn(`[ErrorReporter] Error endpoint response: ${response.status}`);
      } else {
        const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
        console.error(`[ErrorReporter] Error endpoint response: ${response.status} - ${body}`);
      }
    } catch (error) {
      console.error('[ErrorReporter] Failed to send error to endpoint:', error);
    }
  }
}

/**
 * Report a fault raised before the server could accept requests. Only
 * BOARD_ID identifies the board here; there is no request to look at.
 */
export function reportStartupFailure(
  error: unknown,
  config: Pick<AppConfig, 'boardId'>,
  reporter: ErrorReporter
): void {
  console.error('[STARTUP ERROR] Application failed to start:', error);
  reporter.report(
    buildErrorReport(error, {
      boardId: config.boardId,
      requestPath: 'STARTUP',
      requestMethod: 'STARTUP',
      userAgent: 'STARTUP_ERROR',
    })
  );
}
