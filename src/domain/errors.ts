/**
 * Base class for every error the CLI reports to the user.
 */
export class StudioError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StudioError';
    }
}

/**
 * No credential, or one the service rejected before any work started.
 */
export class AuthenticationError extends StudioError {
    constructor(message: string = "API token is required. Run 'studio auth login' to authenticate") {
        super(message);
        this.name = 'AuthenticationError';
    }
}

/**
 * Caller input breaks a documented constraint. Raised before any network call.
 */
export class ValidationError extends StudioError {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * Network failure or non-2xx response from the service.
 */
export class TransportError extends StudioError {
    constructor(
        message: string,
        public readonly statusCode: number = 0,
        public readonly context: string = '',
        public readonly detail?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TransportError';
    }

    isInsufficientCredits(): boolean {
        return this.statusCode === 402;
    }

    isAuthenticationError(): boolean {
        return this.statusCode === 401 || this.statusCode === 403;
    }

    isRateLimitError(): boolean {
        return this.statusCode === 429;
    }

    isNotFound(): boolean {
        return this.statusCode === 404;
    }

    /**
     * Converts the HTTP failure into the line shown to the user.
     */
    getUserFriendlyMessage(): string {
        if (this.isInsufficientCredits()) {
            return 'Insufficient credits. Please upgrade your plan or purchase more credits';
        }
        if (this.isAuthenticationError()) {
            return "Authentication failed. Please run 'studio auth login' to authenticate";
        }
        if (this.isRateLimitError()) {
            return 'Rate limit exceeded. Please wait a moment and try again';
        }
        if (this.isNotFound()) {
            return 'Resource not found. Please check the ID and try again';
        }
        if (this.detail) {
            return this.detail;
        }
        if (this.statusCode > 0) {
            return `API request failed with status ${this.statusCode}`;
        }
        return this.message;
    }
}

/**
 * The remote job itself ended in a failure, cancellation or timeout state.
 */
export class JobFailureError extends StudioError {
    constructor(
        public readonly jobLabel: string,
        public readonly state: string,
        public readonly detail?: string
    ) {
        super(detail
            ? `${jobLabel} failed: ${detail}`
            : `${jobLabel} failed with status: ${state}`);
        this.name = 'JobFailureError';
    }
}

/**
 * Malformed base64 payload.
 */
export class DecodeError extends StudioError {
    constructor(message: string) {
        super(message);
        this.name = 'DecodeError';
    }
}

/**
 * A result URL could not be fetched.
 */
export class DownloadError extends StudioError {
    constructor(message: string, public readonly statusCode?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DownloadError';
    }
}

/**
 * Local filesystem failure (directory creation, file read or write).
 */
export class IOError extends StudioError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'IOError';
    }
}

/**
 * The operation was aborted before the remote job reached a terminal state.
 */
export class CancellationError extends StudioError {
    constructor(public readonly reason: string = 'interrupted') {
        super(`operation cancelled: ${reason}`);
        this.name = 'CancellationError';
    }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
