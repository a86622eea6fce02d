import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { CollectionResult } from '../types/session.js';

const logger = createChildLogger('snapshot-store');

const ClassifiedSessionSchema = z.object({
  status: z.string(),
  interface: z.string(),
  mac_address: z.string(),
  ip_address: z.string(),
  user_name: z.string(),
  method: z.string(),
  vendor: z.string().optional(),
});

const CollectionResultSchema = z.record(ClassifiedSessionSchema);

export class SnapshotStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getPath(): string {
    return this.filePath;
  }

  save(result: CollectionResult): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
    logger.debug({ path: this.filePath, entries: Object.keys(result).length }, 'Snapshot written');
  }

  load(): CollectionResult | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = CollectionResultSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ path: this.filePath }, 'Snapshot has unexpected shape, ignoring');
        return null;
      }
      return parsed.data;
    } catch (err) {
      logger.warn({ path: this.filePath, err: errorMessage(err) }, 'Failed to read snapshot');
      return null;
    }
  }
}
