import express from 'express';
import { selectionLimiter } from '../middleware/rateLimiter';
import { GameParamsSchema } from '../schemas/gameSchemas';
import { GameNotFoundError, GameService, SupersededSelectionError, gameService } from '../services/gameService';
import { isSelectionCancelled } from '../services/location/errors';
import { formatErrorForLogging } from '../utils/errorHandler';
import logger from '../utils/logger';
import {
    ParamsRequest,
    ReplyChannel,
    abortOnDisconnect,
    sendError,
    sendValidationError,
    toTargetResponse
} from './responses';

type GameOperations = Pick<GameService, 'startGame' | 'nextTarget' | 'getCurrentTarget' | 'endGame'>;

/**
 * Map service errors to responses. Cancelled selections get no response:
 * the client is already gone.
 */
function handleGameError(res: ReplyChannel, error: unknown, action: string): void {
    if (isSelectionCancelled(error)) {
        return;
    }
    if (error instanceof GameNotFoundError) {
        sendError(res, 404, error.message, error.code);
        return;
    }
    if (error instanceof SupersededSelectionError) {
        sendError(res, 409, error.message, error.code);
        return;
    }
    logger.error(`❌ Error ${action}:`, formatErrorForLogging(error));
    sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
}

/**
 * @returns the validated game id, or null after answering 400
 */
function parseGameId(req: ParamsRequest, res: ReplyChannel): string | null {
    const validationResult = GameParamsSchema.safeParse(req.params);
    if (!validationResult.success) {
        sendValidationError(res, validationResult.error);
        return null;
    }
    return validationResult.data.gameId;
}

export function createGameHandlers(games: GameOperations = gameService) {
    return {
        async startGame(_req: unknown, res: ReplyChannel): Promise<void> {
            const signal = abortOnDisconnect(res);
            try {
                const { gameId, target } = await games.startGame(signal);
                res.status(201).json({ gameId, target: toTargetResponse(target) });
            } catch (error: unknown) {
                handleGameError(res, error, 'starting game');
            }
        },

        getCurrentTarget(req: ParamsRequest, res: ReplyChannel): void {
            const requestedId = parseGameId(req, res);
            if (requestedId === null) return;

            try {
                const { gameId, target } = games.getCurrentTarget(requestedId);
                res.json({ gameId, target: toTargetResponse(target) });
            } catch (error: unknown) {
                handleGameError(res, error, 'reading current target');
            }
        },

        async nextTarget(req: ParamsRequest, res: ReplyChannel): Promise<void> {
            const requestedId = parseGameId(req, res);
            if (requestedId === null) return;

            const signal = abortOnDisconnect(res);
            try {
                const { gameId, target } = await games.nextTarget(requestedId, signal);
                res.json({ gameId, target: toTargetResponse(target) });
            } catch (error: unknown) {
                handleGameError(res, error, 'selecting next target');
            }
        },

        endGame(req: ParamsRequest, res: ReplyChannel): void {
            const requestedId = parseGameId(req, res);
            if (requestedId === null) return;

            try {
                games.endGame(requestedId);
                res.status(204).end();
            } catch (error: unknown) {
                handleGameError(res, error, 'ending game');
            }
        }
    };
}

const router = express.Router();
const handlers = createGameHandlers();

router.post('/games', selectionLimiter, handlers.startGame);
router.get('/games/:gameId/target', handlers.getCurrentTarget);
router.post('/games/:gameId/target', selectionLimiter, handlers.nextTarget);
router.delete('/games/:gameId', handlers.endGame);

export default router;
