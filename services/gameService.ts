/**
 * Game Service
 * 
 * Owns the "current target" lifecycle of a game session: a selection only
 * becomes current once it completes and is still the latest one requested.
 */

import * as targetStore from '../store/targetStore';
import logger from '../utils/logger';
import { selectRandomTarget } from './locationService';
import { isSelectionCancelled } from './location/errors';
import { TargetLocation } from './location/types';

export class GameNotFoundError extends Error {
    code: string;

    constructor(gameId: string) {
        super(`Game not found: ${gameId}`);
        this.name = 'GameNotFoundError';
        this.code = 'GAME_NOT_FOUND';
    }
}

/**
 * A newer selection for the same game was requested while this one ran
 */
export class SupersededSelectionError extends Error {
    code: string;

    constructor(gameId: string) {
        super(`A newer target was requested for game ${gameId}`);
        this.name = 'SupersededSelectionError';
        this.code = 'SELECTION_SUPERSEDED';
    }
}

export type TargetSelector = (signal?: AbortSignal) => Promise<TargetLocation>;

export interface GameTarget {
    gameId: string;
    target: TargetLocation;
}

export class GameService {
    private readonly selectTarget: TargetSelector;

    constructor(selectTarget: TargetSelector = selectRandomTarget) {
        this.selectTarget = selectTarget;
    }

    async startGame(signal?: AbortSignal): Promise<GameTarget> {
        const gameId = targetStore.create();
        try {
            const { target } = await this.nextTarget(gameId, signal);
            logger.info(`🎮 Game ${gameId} started with target: ${target.name}`);
            return { gameId, target };
        } catch (error: unknown) {
            // A game whose first selection never finished has nothing to show
            targetStore.remove(gameId);
            throw error;
        }
    }

    async nextTarget(gameId: string, signal?: AbortSignal): Promise<GameTarget> {
        const ticket = targetStore.beginSelection(gameId);
        if (ticket === null) {
            throw new GameNotFoundError(gameId);
        }

        let target: TargetLocation;
        try {
            target = await this.selectTarget(signal);
        } catch (error: unknown) {
            if (isSelectionCancelled(error)) {
                logger.info(`🚫 Target selection for game ${gameId} was abandoned`);
            }
            throw error;
        }

        if (!targetStore.commit(gameId, ticket, target)) {
            throw targetStore.has(gameId) ? new SupersededSelectionError(gameId) : new GameNotFoundError(gameId);
        }
        return { gameId, target };
    }

    getCurrentTarget(gameId: string): GameTarget {
        if (!targetStore.has(gameId)) {
            throw new GameNotFoundError(gameId);
        }
        const target = targetStore.getCurrent(gameId);
        if (!target) {
            // Only reachable while the first selection is still running
            throw new GameNotFoundError(gameId);
        }
        return { gameId, target };
    }

    endGame(gameId: string): void {
        if (!targetStore.remove(gameId)) {
            throw new GameNotFoundError(gameId);
        }
        logger.info(`🏁 Game ${gameId} ended`);
    }
}

export const gameService = new GameService();
