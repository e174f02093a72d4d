import type { PageType } from './types';

export class TrackerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends TrackerError {
  readonly url: string;
  readonly status: number | null;
  readonly timedOut: boolean;

  constructor(
    url: string,
    message: string,
    details: { status?: number; timedOut?: boolean; cause?: unknown } = {}
  ) {
    super(`Failed to fetch ${url}: ${message}`, { cause: details.cause });
    this.url = url;
    this.status = details.status ?? null;
    this.timedOut = details.timedOut ?? false;
  }
}

/**
 * Raised when a page lacks the structure a parser anchors on, which usually
 * means the site layout changed.
 */
export class ParseError extends TrackerError {
  readonly pageType: PageType;
  readonly element: string;

  constructor(pageType: PageType, element: string, context?: string) {
    super(
      `${pageType} page${context ? ` (${context})` : ''}: expected ${element} was not found`
    );
    this.pageType = pageType;
    this.element = element;
  }
}

export class ClassificationError extends TrackerError {
  readonly billId: string;

  constructor(billId: string, message: string) {
    super(`Cannot classify ${billId}: ${message}`);
    this.billId = billId;
  }
}

export class AggregationError extends TrackerError {
  readonly memberId: string;
  readonly billId: string;

  constructor(memberId: string, billId: string, message: string) {
    super(`Vote by ${memberId} on ${billId} excluded: ${message}`);
    this.memberId = memberId;
    this.billId = billId;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
