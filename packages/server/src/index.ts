import { loadServerConfig } from './config/serverConfig.js';
import { CardDuelServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';

const config = loadServerConfig();

// LOG_LEVEL in the environment takes precedence over the config file
// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
if (!process.env['LOG_LEVEL']) {
  setLogLevel(config.logging.level);
}

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const PORT = Number(process.env['PORT']) || config.server.port;

logger.info('Starting Card Duel Server...');

const server = new CardDuelServer({
  port: PORT,
  host: config.server.host,
  store: {
    rules: {
      startingHealth: config.match.startingHealth,
      startingHand: config.match.startingHand,
    },
    forfeitOnDisconnect: config.match.forfeitOnDisconnect,
  },
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down...');
  server.close();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down...');
  server.close();
  process.exit(0);
});
