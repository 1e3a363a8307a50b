// Last provider/model selection, persisted so it survives restarts

import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { PROVIDER_NAMES, type ProviderSelection } from '../config.js';
import { readFileIfExists, SerialQueue, writeFileAtomic } from './fileUtils.js';

export const selectionSchema = z.object({
  provider: z.enum(PROVIDER_NAMES),
  model: z.string().min(1),
});

export class SelectionStore {
  private readonly path: string;
  private readonly queue = new SerialQueue();
  private current: ProviderSelection | null = null;

  constructor(
    dataDir: string,
    private readonly fallback: ProviderSelection,
    private readonly logger: Logger,
  ) {
    this.path = join(dataDir, 'selection.json');
  }

  get(): Promise<ProviderSelection> {
    return this.queue.run(async () => {
      if (this.current) return this.current;
      const raw = await readFileIfExists(this.path);
      if (raw === null) {
        this.current = this.fallback;
        return this.current;
      }
      const parsed = selectionSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn({ path: this.path }, 'Ignoring invalid stored selection');
        this.current = this.fallback;
      } else {
        this.current = parsed.data;
      }
      return this.current;
    });
  }

  set(selection: ProviderSelection): Promise<ProviderSelection> {
    return this.queue.run(async () => {
      await writeFileAtomic(this.path, JSON.stringify(selection, null, 2));
      this.current = selection;
      this.logger.info(selection, 'Provider selection changed');
      return selection;
    });
  }
}
