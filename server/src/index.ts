import 'dotenv/config';
import { loadConfig, loadSettings } from './config.js';
import { errorMessage } from './errors.js';
import { OperationJournal } from './journal.js';
import { log, setLogLevel } from './logging.js';
import { OpenAICandidateClassifier } from './openai.js';
import { TitleRegistry } from './registry.js';
import { buildServer } from './server.js';

process.on('uncaughtException', err => {
  log('error', `uncaughtException: ${err.stack ?? String(err)}`);
});
process.on('unhandledRejection', r => {
  log('error', `unhandledRejection: ${r instanceof Error ? r.stack ?? r.message : String(r)}`);
});

async function bootstrap() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const settings = loadSettings(config.settingsPath);
  const registry = new TitleRegistry({ franchises: settings.knownFranchises });
  const journal = new OperationJournal(config.journalPath);
  const candidate = config.openai ? new OpenAICandidateClassifier(config.openai) : undefined;
  if (!candidate) log('info', 'OPENAI_API_KEY not set; classifying with local rules only');

  const app = await buildServer({ config, settings, registry, journal, candidate });

  const shutdown = (signal: string) => {
    log('info', `${signal} received, closing server`);
    app.close().then(
      () => process.exit(0),
      err => {
        log('error', `close failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  log('info', `Server listening on ${config.port}`);
}

bootstrap().catch(err => {
  log('error', `startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
