/**
 * Typed errors raised by the sync pipeline and the service client.
 */

export class DashboardSyncError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Remote service

export class GrafanaApiError extends DashboardSyncError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string,
    public readonly path: string,
    details?: Record<string, unknown>,
  ) {
    super(
      "GRAFANA_API_ERROR",
      `Grafana error: ${method} ${path} → ${status} ${statusText}`,
      details,
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        status: this.status,
        method: this.method,
        path: this.path,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Local source directory

export class MissingSourceError extends DashboardSyncError {
  constructor(details?: Record<string, unknown>) {
    super("MISSING_SOURCE", "No source directory configured", details);
  }
}

export class InvalidSourceError extends DashboardSyncError {
  constructor(path: string, details?: Record<string, unknown>) {
    super("INVALID_SOURCE", `Source is not a directory: ${path}`, {
      path,
      ...details,
    });
  }
}

export class MissingDestinationError extends DashboardSyncError {
  constructor(details?: Record<string, unknown>) {
    super("MISSING_DESTINATION", "No destination directory configured", details);
  }
}

// Operator

export class UploadAbortedError extends DashboardSyncError {
  constructor(details?: Record<string, unknown>) {
    super("UPLOAD_ABORTED", "Upload cancelled at confirmation", details);
  }
}
