import { ForwardChainer, createForwardChainer } from './engines/forward/chainer.js';
import { SessionManager, createSessionManager } from './session/manager.js';

export interface ServerContainer {
    chainer: ForwardChainer;
    sessionManager: SessionManager;
}

export function createContainer(): ServerContainer {
    const chainer = createForwardChainer();
    const sessionManager = createSessionManager(chainer);

    return {
        chainer,
        sessionManager,
    };
}
