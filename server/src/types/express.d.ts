// src/types/express.d.ts
import type { KyselyDB } from '@batchkeep/shared/database';

declare global {
    namespace Express {
        interface Request {
            /** Store handle attached by createApp; owned by the server, not the request */
            db: KyselyDB;
        }
    }
}

export {};
