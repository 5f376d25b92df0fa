import dotenv from 'dotenv';
import { loadEnvironmentConfig } from './config/config';
import { AmqpTransport } from './bus/AmqpTransport';
import { InMemoryTransport } from './bus/InMemoryTransport';
import type { BrokerTransport } from './bus/transport';
import { createRuntime } from './runtime';
import { createApp } from './app';

// Load environment variables
dotenv.config();

const envConfig = loadEnvironmentConfig();

// =============================================================================
// BROKER
// Use RabbitMQ when configured; otherwise an in-process broker so the
// service can run on its own during development.
// =============================================================================

const transport: BrokerTransport = envConfig.bus.rabbitmqUrl
  ? new AmqpTransport({
      url: envConfig.bus.rabbitmqUrl,
      exchange: envConfig.bus.exchange,
      prefetch: envConfig.bus.prefetch
    })
  : new InMemoryTransport();

const runtime = createRuntime({ transport, env: envConfig });
const app = createApp(runtime);

// =============================================================================
// START SERVER
// =============================================================================

async function main(): Promise<void> {
  await runtime.start();

  const PORT = envConfig.port;
  const server = app.listen(PORT, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                  TRIP ORCHESTRATOR SERVICE                    ║
╠═══════════════════════════════════════════════════════════════╣
║  Status:      Running                                         ║
║  Service:     ${envConfig.serviceName.padEnd(47)}║
║  Port:        ${PORT.toString().padEnd(47)}║
║  Environment: ${envConfig.nodeEnv.padEnd(47)}║
║  API Base:    http://localhost:${PORT}/api${' '.repeat(27)}║
╚═══════════════════════════════════════════════════════════════╝
  `);

    if (!envConfig.bus.rabbitmqUrl) {
      console.warn('⚠️  WARNING: RABBITMQ_URL not set. Using in-memory broker; events stay inside this process.');
    }
  });

  const shutdown = (signal: string): void => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    runtime.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[Server] Error during shutdown:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
