import { SessionStore } from '../../services/sessionStore.js';
import { config } from '../../utils/config.js';

export async function clearSessionCommand(): Promise<void> {
  const store = new SessionStore(config.dataDir);
  await store.clear();
  console.log(`Saved session removed from ${config.dataDir}`);
}
