/**
 * Error taxonomy for the keyword checker.
 * Each error carries the HTTP status the server answers with.
 */
export class TrendCheckerError extends Error {
    readonly status: number;

    constructor(message: string, status: number) {
        super(message);
        this.name = new.target.name;
        this.status = status;
    }
}

export class EmptyKeywordError extends TrendCheckerError {
    constructor() {
        super('Keyword cannot be empty', 400);
    }
}

export class NoCategoryAvailableError extends TrendCheckerError {
    constructor() {
        super('No category available for matching', 503);
    }
}

/**
 * Raised after the category stage succeeded, so the category match travels
 * with the error and the caller can still report it.
 */
export class CategoryDatasetError extends TrendCheckerError {
    readonly category: string;
    readonly categorySimilarity: number;

    constructor(message: string, category: string, categorySimilarity: number) {
        super(message, 404);
        this.category = category;
        this.categorySimilarity = categorySimilarity;
    }
}

export class CategoryDataMissingError extends CategoryDatasetError {
    constructor(category: string, categorySimilarity: number) {
        super(`Data file not found for category: ${category}`, category, categorySimilarity);
    }
}

export class EmptyCategoryDatasetError extends CategoryDatasetError {
    constructor(category: string, categorySimilarity: number) {
        super(`No keyword data found for category: ${category}`, category, categorySimilarity);
    }
}

// LLM invocation failed or timed out
export class ServiceError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ServiceError';
    }
}
