import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const stationsSchema = z.array(z.string().min(1)).nonempty();

// Found beside the sources (src/cli) or the build output (dist/src/cli)
const CANDIDATES = ['../../data/stations.json', '../../../data/stations.json'];

let cached: string[] | null = null;

export function loadStations(): string[] {
  if (cached) return cached;

  for (const candidate of CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch {
      continue;
    }
    cached = stationsSchema.parse(JSON.parse(text));
    return cached;
  }

  throw new Error('Station list not found (data/stations.json)');
}
