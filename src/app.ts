import { HOST, PORT, SHUTDOWN_GRACE_MS } from 'App/config/config';
import { createServer } from './server';
import { MonitorService } from './services/MonitorService';

const FORCE_EXIT_MS = 10000;

export const main = async () => {
  const monitor = await MonitorService.createForHost();
  const { server, io } = createServer(monitor);

  monitor.start();
  server.listen(PORT, HOST, () => {
    console.log(`Now listening on http://${HOST}:${PORT}`);
  });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    console.log(`\n[Shutdown] Caught ${signal}, closing...`);
    // Force exit if hanging
    setTimeout(() => process.exit(1), FORCE_EXIT_MS).unref();
    try {
      await monitor.shutdown(SHUTDOWN_GRACE_MS);
      // closes the HTTP server too
      const closed = io.close(err => {
        if (err) console.error('[Shutdown] HTTP server close failed', err);
        else console.log('[Shutdown] HTTP server closed');
        process.exit(err ? 1 : 0);
      });
      server.closeAllConnections();
      await closed;
    } catch (e) {
      console.error('[Shutdown] Error while closing', e);
      process.exit(1);
    }
  };
  ['SIGINT', 'SIGTERM'].forEach(sig => process.on(sig, () => void shutdown(sig)));
};

main().catch(err => {
  console.error('[Startup] Failed to start:', err);
  process.exit(1);
});
