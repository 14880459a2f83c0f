import { loadConfig } from './config.js';
import { CorpusStore, datasetBuilder } from './corpus-store.js';
import { createApp } from './app.js';

/**
 * Start the server. The index is built before the port opens; a fatal build
 * failure stops the process.
 */
async function bootstrap() {
  const config = await loadConfig({ rootDir: process.cwd() });

  console.log(`Loading datasets from: ${config.dataDir}`);
  const store = new CorpusStore(datasetBuilder({ dataDir: config.dataDir, files: config.files }));
  const { index, report } = await store.reload();

  console.log(`Loaded ${index.size()} verses across ${report.surahCount} surahs`);
  if (report.missingTranslation.length > 0 || report.missingCommentary.length > 0) {
    console.warn(`Missing translation for ${report.missingTranslation.length} verses, commentary for ${report.missingCommentary.length}`);
  }
  if (report.issues.length > 0) {
    console.warn(`${report.issues.length} integrity issues; see GET /api/integrity`);
  }
  if (!report.ok) {
    console.warn('Integrity check failed: duplicate, out-of-order or unsanitized verses present');
  }

  const app = createApp(store, config);

  const server = app.listen(config.port, () => {
    console.log(`Ayah API listening on http://localhost:${config.port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(err => {
  console.error('Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
