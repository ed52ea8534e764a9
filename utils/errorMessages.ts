/**
 * Error message mappings for the resource hook engine
 * Maps error codes to the title, hint and category rendered into JSON:API error objects
 */

export type ErrorCategory = 'validation' | 'request' | 'authorization' | 'setup' | 'system';

export interface ErrorMessage {
    userMessage: string;
    suggestion?: string;
    category: ErrorCategory;
}

export const ERROR_MESSAGES: Record<string, ErrorMessage> = {
    // Request errors
    'RESOURCE_NOT_FOUND': {
        userMessage: 'The requested resource does not exist',
        suggestion: 'Check the resource type and id',
        category: 'request'
    },
    'INVALID_INCLUDE': {
        userMessage: 'The include parameter references an unknown relationship',
        suggestion: 'Use the public relationship names, separated by dots for nested relationships',
        category: 'request'
    },
    'UNKNOWN_RELATIONSHIP': {
        userMessage: 'The relationship does not exist on this resource',
        category: 'request'
    },
    'INVALID_RELATIONSHIP_DATA': {
        userMessage: 'The relationship data does not match the relationship',
        suggestion: 'Send a single id or null for a to-one relationship',
        category: 'request'
    },

    // Validation errors
    'VALIDATION_ERROR': {
        userMessage: 'The request contains invalid values',
        suggestion: 'Fix the listed fields and send the request again',
        category: 'validation'
    },
    'INVALID_FORMAT': {
        userMessage: 'This value has an invalid format',
        suggestion: 'Please check the expected format and try again',
        category: 'validation'
    },
    'REQUIRED_FIELD': {
        userMessage: 'This field is required',
        category: 'validation'
    },

    // Authorization errors
    'RESOURCE_FILTERED': {
        userMessage: 'The operation was rejected by a resource hook',
        category: 'authorization'
    },

    // Setup errors
    'RESOURCE_SETUP': {
        userMessage: 'The resource graph is misconfigured',
        suggestion: 'Check the resource and relationship decorators',
        category: 'setup'
    },

    // System errors
    'HOOK_CONTRACT_VIOLATION': {
        userMessage: 'A resource hook returned a result that breaks the response contract',
        category: 'system'
    },
    'DATABASE_VALUES_UNAVAILABLE': {
        userMessage: 'Database values were not loaded for this hook',
        suggestion: 'Enable database values globally or annotate the hook with @LoadDatabaseValues()',
        category: 'system'
    },
    'INTERNAL_ERROR': {
        userMessage: 'An internal error occurred',
        suggestion: 'Please try again later',
        category: 'system'
    }
};

export function getErrorMessage(code: string): ErrorMessage {
    return ERROR_MESSAGES[code] || {
        userMessage: 'An unexpected error occurred',
        suggestion: 'Please try again or contact support if the problem persists',
        category: 'system'
    };
}

/**
 * Convert a Zod issue code to an error code
 */
export function mapZodIssueToErrorCode(issueCode: string, received?: unknown): string {
    if (issueCode === 'invalid_type' && received === 'undefined') {
        return 'REQUIRED_FIELD';
    }
    return 'INVALID_FORMAT';
}
