import { createApp } from './app';
import { env } from './config';
import { envDebug } from '@lendwise/config';
import { createLogger } from '@lendwise/observability';
import { orchestratorService } from './services/orchestrator.service';

envDebug('origination-service');

const log = createLogger('origination-service');

createApp(orchestratorService).listen(env.PORT, () => {
  log.info({ collaboratorMode: env.ORIG_COLLABORATOR_MODE }, `origination-service listening on http://localhost:${env.PORT}`);
});
