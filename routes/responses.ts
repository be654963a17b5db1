import { Request } from 'express';
import { ZodError } from 'zod';
import { TargetLocation } from '../services/location/types';

export interface TargetResponse {
    name: string;
    latitude: number;
    longitude: number;
    source: TargetLocation['source'];
}

/**
 * The parts of an express Response the handlers use
 */
export interface ReplyChannel {
    status(code: number): ReplyChannel;
    json(body: unknown): unknown;
    end(): unknown;
    on(event: 'close', listener: () => void): unknown;
    readonly writableFinished: boolean;
}

export type ParamsRequest = Pick<Request, 'params'>;

export function toTargetResponse(target: TargetLocation): TargetResponse {
    return {
        name: target.name,
        latitude: target.coordinate.latitude,
        longitude: target.coordinate.longitude,
        source: target.source
    };
}

/**
 * Abort signal that fires if the client disconnects before we respond
 */
export function abortOnDisconnect(res: ReplyChannel): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}

export function sendError(res: ReplyChannel, status: number, message: string, code: string): void {
    res.status(status).json({
        status: 'error',
        error: { message, code }
    });
}

export function sendValidationError(res: ReplyChannel, error: ZodError): void {
    res.status(400).json({
        status: 'error',
        error: {
            message: 'Validation failed',
            details: error.format(),
            code: 'VALIDATION_ERROR'
        }
    });
}
