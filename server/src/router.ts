import { initTRPC, TRPCError } from '@trpc/server';
import { z } from 'zod';
import { MediaEntry } from '../../common/types';
import { PlaybackState } from './clock';
import { SessionSummary } from './sessions';

export interface ServerStatus {
  isPlaying: boolean;
  itemDuration: number;
  catalogSize: number;
  sessions: number;
  currentIndex: number;
  remaining: number;
}

/** Operator operations, implemented by AdServer. */
export interface OperatorApi {
  status(): Promise<ServerStatus>;
  listEntries(): MediaEntry[];
  listSessions(): SessionSummary[];
  togglePlayback(): Promise<Readonly<PlaybackState>>;
  setItemDuration(seconds: number): Promise<void>;
  addEntry(entry: { label: string; path?: string }): Promise<MediaEntry>;
  removeEntry(id: number): Promise<boolean>;
  rescan(): Promise<boolean>;
}

const t = initTRPC.create();
const router = t.router;
const publicProcedure = t.procedure;

export function createOperatorRouter(api: OperatorApi) {
  return router({
    status: publicProcedure.query(() => api.status()),

    ads: publicProcedure.query(() => api.listEntries()),

    sessions: publicProcedure.query(() => api.listSessions()),

    togglePlayback: publicProcedure.mutation(() => api.togglePlayback()),

    setDuration: publicProcedure
      .input(z.object({ seconds: z.number().positive() }))
      .mutation(async ({ input }) => {
        await api.setItemDuration(input.seconds);
        return { itemDuration: input.seconds };
      }),

    addAd: publicProcedure
      .input(z.object({ label: z.string().min(1), path: z.string().min(1).optional() }))
      .mutation(({ input }) => api.addEntry(input)),

    removeAd: publicProcedure
      .input(z.object({ id: z.number().int().positive() }))
      .mutation(async ({ input }) => {
        const removed = await api.removeEntry(input.id);
        if (!removed) {
          throw new TRPCError({ code: 'NOT_FOUND', message: `No ad with id ${input.id}` });
        }
        return { removed: input.id };
      }),

    rescan: publicProcedure.mutation(async () => ({ changed: await api.rescan() }))
  });
}

// Export type definition of API
export type OperatorRouter = ReturnType<typeof createOperatorRouter>;
