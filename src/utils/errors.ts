/**
 * Fatal error types. Nothing in the pipeline recovers from these:
 * the crawl or load stops and the CLI reports the context fields.
 */

/**
 * URL outside the catalog prefix. Raised before any fetch is attempted.
 */
export class InvalidUrlError extends Error {
    constructor(
        public readonly url: string,
        public readonly prefix: string
    ) {
        super(`Only pages under ${prefix} can be scraped, got "${url}"`);
        this.name = 'InvalidUrlError';
    }
}

/**
 * A field rule could not produce a value for the page.
 */
export class ExtractionError extends Error {
    constructor(
        public readonly field: string,
        public readonly detail: string,
        public readonly url?: string
    ) {
        super(`[${field}] ${detail}${url ? ` (${url})` : ''}`);
        this.name = 'ExtractionError';
    }

    /**
     * Same error, attributed to the page it came from.
     */
    withUrl(url: string): ExtractionError {
        return new ExtractionError(this.field, this.detail, url);
    }
}

/**
 * Lineage taxonomy with an unknown position or an unsupported shape.
 */
export class LineageError extends Error {
    constructor(
        message: string,
        public readonly positions: string[]
    ) {
        super(`${message} (positions: ${positions.join(', ') || 'none'})`);
        this.name = 'LineageError';
    }
}

/**
 * The catalog walk left its expected cycle.
 */
export class CrawlError extends Error {
    constructor(
        message: string,
        public readonly url: string
    ) {
        super(message);
        this.name = 'CrawlError';
    }
}

/**
 * A row could not be written to the relational store.
 */
export class LoadError extends Error {
    public readonly pokemon?: string;
    public readonly table?: string;

    constructor(message: string, context: { pokemon?: string; table?: string; cause?: unknown } = {}) {
        super(message, { cause: context.cause });
        this.name = 'LoadError';
        this.pokemon = context.pokemon;
        this.table = context.table;
    }
}
