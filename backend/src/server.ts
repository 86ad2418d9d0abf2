import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createApp } from './app';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATA_DIR: z.string().optional(),
  NODE_ENV: z.string().default('development'),
});

const env = envSchema.parse(process.env);
const DATA_DIR = env.DATA_DIR ?? path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'data');

const app = createApp({ dataDir: DATA_DIR, cacheArtifacts: env.NODE_ENV === 'production' });

app.listen(env.PORT, () => {
  console.log(`Serving ${DATA_DIR}`);
  console.log(`Server listening on port ${env.PORT}`);
});
