import type { Requester } from '@chartdesk/shared';

declare global {
    namespace Express {
        interface Request {
            requester?: Requester; // Set by requireRequester from X-User-Id / X-Platform
        }
    }
}
