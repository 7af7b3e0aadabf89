import { createApp } from './app.js';
import { cfg, configWarnings } from './config.js';
import { buildDiscovery } from './discovery/factory.js';
import { errorMessage } from './sources/types.js';

for (const warning of configWarnings(cfg)) console.warn(`⚠️ ${warning}`);

const discovery = buildDiscovery(cfg);
const app = createApp(discovery);

// scheduled discovery; a tick that lands while a run is active is skipped
if (cfg.discovery.intervalMinutes > 0) {
  const everyMs = cfg.discovery.intervalMinutes * 60_000;
  setInterval(() => {
    if (discovery.orchestrator.isRunning) {
      console.log('[scheduler] previous run still active, skipping tick');
      return;
    }
    discovery.orchestrator.run().catch((err) => {
      console.error('[scheduler] run crashed:', errorMessage(err));
    });
  }, everyMs);
  console.log(`[scheduler] discovery every ${cfg.discovery.intervalMinutes} min`);
}

// start
app.listen(cfg.port, () => {
  console.log(`Server running on :${cfg.port}`);
});
