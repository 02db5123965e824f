/**
 * Bot API Errors
 *
 * Programmer errors (bad update, bad argument) are thrown. Transport and
 * decoding problems on dispatched calls are not: they come back as result
 * values (see DispatchResult).
 */

/**
 * Base of every error the library throws
 */
export class BotApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'BotApiError';
    }
}

/**
 * The current update cannot be classified into exactly one kind
 */
export class InvalidUpdateError extends BotApiError {
    constructor(
        message: string,
        public readonly keys: string[] = [],
        cause?: unknown
    ) {
        super(message, undefined, cause);
        this.name = 'InvalidUpdateError';
    }
}

/**
 * A structurally required argument is missing or has the wrong shape
 */
export class InvalidArgumentError extends BotApiError {
    constructor(
        message: string,
        public readonly argument?: string,
        cause?: unknown
    ) {
        super(message, undefined, cause);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * Network or HTTP failure on the calls that do not return a result envelope
 * (file download, webhook command simulation)
 */
export class TransportError extends BotApiError {
    constructor(message: string, statusCode?: number, cause?: unknown) {
        super(message, statusCode, cause);
        this.name = 'TransportError';
    }
}
