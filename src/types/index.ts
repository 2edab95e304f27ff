/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    isLogicException,
    getSuggestion,
    createParseError,
    createUnsafeRuleError,
    createArityMismatchError,
    createInvalidQueryError,
    createNonGroundFactError,
    createRoundCapError,
    createInvalidOptionError,
    createInvalidArgumentsError,
    createSessionNotFoundError,
    createSessionLimitError,
    createInternalError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export term types
export type {
    Constant,
    Variable,
    Term,
    Fact,
    Rule,
    Substitution,
} from './terms.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export trace types
export type {
    InferenceStep,
    ChainStatus,
    ChainStatistics,
    ChainResult,
} from './trace.js';

// Re-export response types
export type {
    Verbosity,
    ChainOutcome,
    MinimalChainResponse,
    StandardChainResponse,
    DetailedChainResponse,
    ChainResponse,
    TraceEntry,
    SessionInfo,
    AssertResponse,
    RetractResponse,
    KnowledgeListResponse,
    SessionClearResponse,
    SessionDeleteResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    ReasoningOptions,
    ChainOptions,
} from './options.js';
