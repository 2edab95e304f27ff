export {
    ForwardChainer,
    createForwardChainer,
    forwardChain,
    toRule,
} from './chainer.js';
export type { ChainInput, RuleInput } from './chainer.js';
export { formatStep, formatTrace, toTraceEntry, explain, formatProof } from './trace.js';
