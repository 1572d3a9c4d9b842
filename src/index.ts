import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { RobotRegistry } from './engine/registry.js';
import { loadConfig } from './world/config.js';

const config = loadConfig();

// ─── Initialize ───
console.log('🤖 Initializing robot registry...');
const registry = new RobotRegistry({
  rules: config.rules,
  autoCreate: config.autoCreate,
  seed: config.seed,
});
console.log(`🔋 ${registry.size} robot(s) online. Move cost ${config.rules.moveCost}, attack ${config.rules.attackDamage} dmg.`);

if (config.autoCreate) {
  console.log('⚠️  AUTO_CREATE enabled — unknown robot ids are provisioned on first use');
}

const app = createApp(registry, { devMode: config.devMode });

// ─── Start ───
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`\n🛰️  Robot service is live at http://localhost:${info.port}\n`);
});

// ─── Shutdown ───
function shutdown(signal: string) {
  console.log(`\n${signal} received, shutting down...`);
  server.close((err) => {
    registry.close();
    if (err) {
      console.error('Failed to close server:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
