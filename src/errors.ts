/**
 * cvekit error types
 *
 * Everything raised by the library extends `CvekitError`, so callers can
 * separate library failures from programming errors with one `instanceof`.
 */

export class CvekitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CvekitError';
  }
}

// ============================================================
// Record Errors
// ============================================================

/** A single schema violation found while validating a container */
export interface SchemaViolation {
  /** Human-readable text; violations are ordered by it */
  message: string;
  /** JSON Pointer to the offending value ('' for the document root) */
  path: string;
  /** JSON Schema keyword that failed (required, type, enum, ...) */
  keyword: string;
  /** JSON Pointer into the schema document */
  schemaPath: string;
}

export class CveRecordValidationError extends CvekitError {
  readonly violations: readonly SchemaViolation[];
  readonly schema: string;

  constructor(schema: string, violations: readonly SchemaViolation[]) {
    const details = violations.map(v => v.message).join('\n');
    super(`Schema validation against ${schema} failed:\n${details}`);
    this.name = 'CveRecordValidationError';
    this.schema = schema;
    this.violations = violations;
  }
}

/** A full record does not hold exactly the container that was requested */
export class ContainerExtractionError extends CvekitError {
  constructor(message: string) {
    super(message);
    this.name = 'ContainerExtractionError';
  }
}

export class MultipleContainersError extends ContainerExtractionError {
  readonly count: number;

  constructor(count: number) {
    super(`Cannot extract ADP container if multiple are present in CVE record (found ${count})`);
    this.name = 'MultipleContainersError';
    this.count = count;
  }
}

export class MissingContainerError extends ContainerExtractionError {
  readonly container: string;

  constructor(container: string) {
    super(`CVE record has no ${container} container`);
    this.name = 'MissingContainerError';
    this.container = container;
  }
}

export class SchemaNotFoundError extends CvekitError {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaNotFoundError';
  }
}

// ============================================================
// API Errors
// ============================================================

/** Network failure, timeout or non-2xx response from CVE Services */
export class CveApiRequestError extends CvekitError {
  readonly method: string;
  readonly url: string;

  constructor(message: string, method: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CveApiRequestError';
    this.method = method;
    this.url = url;
  }
}

export class CveApiHttpError extends CveApiRequestError {
  readonly status: number;
  readonly statusText: string;
  /** Decoded response body, or the raw text when it is not JSON */
  readonly body: unknown;
  /** Service error code (e.g. CVE_RECORD_EXISTS) when the body carries one */
  readonly code: string | undefined;

  constructor(method: string, url: string, status: number, statusText: string, body: unknown) {
    const code = readServiceField(body, 'error');
    const detail = readServiceField(body, 'message');
    let message = `${status} ${statusText} for ${method} ${url}`;
    if (code) message += ` (${code})`;
    if (detail) message += `: ${detail}`;
    super(message, method, url);
    this.name = 'CveApiHttpError';
    this.status = status;
    this.statusText = statusText;
    this.body = body;
    this.code = code;
  }
}

/** The service answered 2xx, but not with the shape the client expects */
export class CveApiResponseError extends CvekitError {
  constructor(message: string) {
    super(message);
    this.name = 'CveApiResponseError';
  }
}

export class CveConfigurationError extends CvekitError {
  constructor(message: string) {
    super(message);
    this.name = 'CveConfigurationError';
  }
}

function readServiceField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}
