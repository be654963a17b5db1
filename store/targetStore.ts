/**
 * Target Store - current target per game session
 * 
 * Backed by the in-memory session cache; sessions expire after a period of
 * inactivity, and every read or write restarts the clock.
 * Each selection takes a ticket up front and may only commit while its ticket
 * is still the latest, so a slow or abandoned selection never overwrites a newer target.
 */

import { v4 as uuidv4 } from 'uuid';
import { CacheKeys, sessionCache } from '../utils/cache';
import { config } from '../config';
import logger from '../utils/logger';
import { TargetLocation } from '../services/location/types';

interface GameSession {
    readonly current: TargetLocation | null;
    readonly latestTicket: number;
}

const sessionKey = (gameId: string): string => CacheKeys.gameSession(gameId);

const ttl = (): number => config.games.sessionTtlSeconds;

function read(gameId: string): GameSession | null {
    const session = sessionCache.get<GameSession>(sessionKey(gameId));
    if (session) {
        sessionCache.touch(sessionKey(gameId), ttl());
    }
    return session;
}

function write(gameId: string, session: GameSession): void {
    sessionCache.set(sessionKey(gameId), Object.freeze(session), ttl());
}

export function create(): string {
    const gameId = uuidv4();
    write(gameId, { current: null, latestTicket: 0 });
    logger.debug(`🎮 Game session created: ${gameId}`);
    return gameId;
}

export function has(gameId: string): boolean {
    return sessionCache.touch(sessionKey(gameId), ttl());
}

export function getCurrent(gameId: string): TargetLocation | null {
    return read(gameId)?.current ?? null;
}

/**
 * Reserve the right to commit the next target.
 * @returns ticket, or null for an unknown game
 */
export function beginSelection(gameId: string): number | null {
    const session = read(gameId);
    if (!session) return null;

    const ticket = session.latestTicket + 1;
    write(gameId, { ...session, latestTicket: ticket });
    return ticket;
}

/**
 * @returns true when the target became current
 */
export function commit(gameId: string, ticket: number, target: TargetLocation): boolean {
    const session = read(gameId);
    if (!session) {
        logger.debug(`🎮 Dropping target for expired game ${gameId}`);
        return false;
    }
    if (session.latestTicket !== ticket) {
        logger.debug(`🎮 Dropping stale target for game ${gameId}`, { ticket, latestTicket: session.latestTicket });
        return false;
    }

    write(gameId, { ...session, current: target });
    return true;
}

/**
 * @returns false for an unknown or expired game
 */
export function remove(gameId: string): boolean {
    return sessionCache.del(sessionKey(gameId)) > 0;
}
