import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadNetworkConfig } from './services/configLoader.js';
import { resolveSettings } from './services/settings.js';
import { SimulationSession } from './services/simulationSession.js';

dotenv.config();

async function main(): Promise<void> {
  const settings = resolveSettings();
  const config = await loadNetworkConfig(settings.networkConfigPath);
  const session = SimulationSession.fromConfig(config);

  for (const issue of session.buildIssues) {
    console.warn(`[network] ${issue.message}`);
  }
  console.log(`[network] loaded ${session.network.size} nodes from ${settings.networkConfigPath}`);

  const app = createApp(session, settings);
  app.listen(settings.port, () => {
    console.log(`Server listening on http://localhost:${settings.port}`);
  });
}

main().catch((err) => {
  console.error('Failed to start network simulator', err);
  process.exit(1);
});
