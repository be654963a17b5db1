import express from 'express';
import { selectionLimiter } from '../middleware/rateLimiter';
import { TargetSelector } from '../services/gameService';
import { selectRandomTarget } from '../services/locationService';
import { isSelectionCancelled } from '../services/location/errors';
import { CacheStore, geocodeCache } from '../utils/cache';
import { formatErrorForLogging } from '../utils/errorHandler';
import logger from '../utils/logger';
import { ReplyChannel, abortOnDisconnect, sendError, toTargetResponse } from './responses';

export function createTargetHandlers(
    selectTarget: TargetSelector = selectRandomTarget,
    cache: Pick<CacheStore, 'getStats'> = geocodeCache
) {
    return {
        health(_req: unknown, res: ReplyChannel): void {
            res.json({ status: 'ok', cache: cache.getStats() });
        },

        // One-off target, not tied to a game session
        async randomTarget(_req: unknown, res: ReplyChannel): Promise<void> {
            const signal = abortOnDisconnect(res);
            try {
                const target = await selectTarget(signal);
                res.json({ target: toTargetResponse(target) });
            } catch (error: unknown) {
                if (isSelectionCancelled(error)) {
                    return;
                }
                logger.error('❌ Error selecting target:', formatErrorForLogging(error));
                sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
            }
        }
    };
}

const router = express.Router();
const handlers = createTargetHandlers();

router.get('/health', handlers.health);
router.get('/target', selectionLimiter, handlers.randomTarget);

export default router;
