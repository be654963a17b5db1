import { z } from 'zod';

export const GameParamsSchema = z.object({
  gameId: z.string().uuid('gameId must be a UUID')
});

export type GameParams = z.infer<typeof GameParamsSchema>;
