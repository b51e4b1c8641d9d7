import 'express-session';
import { User } from '../db/entities/User';

export type FlashCategory = 'success' | 'error' | 'warning' | 'info';

export interface FlashMessage {
    category: FlashCategory;
    message: string;
}

export interface OidcChecks {
    state: string;
    nonce: string;
}

declare module 'express-session' {
    interface SessionData {
        userId: number;
        flash: FlashMessage[];
        csrfToken: string;
        oidc: OidcChecks;
    }
}

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            currentUser?: User;
        }
    }
}
