import { createPoolApp } from './app';
import { loadAnalysisConfig, loadServerConfig } from './lib/config';
import { errorMessage } from './lib/errors';
import { loadPoolDataset } from './lib/service';

function start(): void {
  const serverConfig = loadServerConfig();
  const analysis = loadAnalysisConfig(serverConfig.configPath);

  console.log(
    `[pool-trends-api] config: dataDir=${serverConfig.dataDirectory}, ` +
      `configFile=${serverConfig.configPath ?? 'none'}, metric=${analysis.metric}, ` +
      `timeColumn=${analysis.timeColumn}, cors=${serverConfig.corsOrigin || 'disabled'}`
  );

  const loaded = loadPoolDataset(serverConfig.dataDirectory);
  const app = createPoolApp({ loaded, analysis, corsOrigin: serverConfig.corsOrigin });

  app.listen(serverConfig.port, serverConfig.host, () => {
    console.log(`[pool-trends-api] listening on ${serverConfig.host}:${serverConfig.port}`);
  });
}

try {
  start();
} catch (error) {
  console.error(`[pool-trends-api] failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
}
