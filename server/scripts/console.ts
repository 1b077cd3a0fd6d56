import { createInterface } from 'node:readline/promises';
import dotenv from 'dotenv';
import { writeReport } from '../../simulation/engine/ReportWriter.js';
import { type CommandResult, executeCommand } from '../cli/commands.js';
import { loadNetworkConfig } from '../services/configLoader.js';
import { resolveSettings } from '../services/settings.js';
import { SimulationSession } from '../services/simulationSession.js';

dotenv.config();

async function main(): Promise<void> {
  const settings = resolveSettings();
  const config = await loadNetworkConfig(settings.networkConfigPath);
  const session = SimulationSession.fromConfig(config);

  for (const issue of session.buildIssues) {
    console.warn(`[network] ${issue.message}`);
  }
  console.log(`--- Network simulator: ${session.network.size} nodes loaded. Type 'help' for commands. ---`);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const line = await rl.question('netsim> ');
      let result: CommandResult;
      try {
        result = await executeCommand(line, session, { reportPath: settings.reportPath });
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        continue;
      }
      for (const out of result.lines) console.log(out);
      if (result.exit) break;
    }

    if (session.events.size > 0) {
      const answer = await rl.question(`Save routing report to ${settings.reportPath}? (y/n) `);
      if (answer.trim().toLowerCase().startsWith('y')) {
        await writeReport(session.events.getRecords(), settings.reportPath);
        console.log(`Report written to ${settings.reportPath}`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error('Network console failed', err);
  process.exit(1);
});
