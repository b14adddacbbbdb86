import path from 'path';
import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { PROTOCOL_VERSION } from '@lanwake/protocol';
import { config } from './config';
import { logger } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { healthLimiter } from './middleware/rateLimiter';
import { specs } from './swagger';
import HostRegistry from './services/hostRegistry';
import { JsonFileRegistryStorage } from './services/registryStorage';
import AddressResolver from './services/addressResolver';
import StatusPoller from './services/statusPoller';
import * as hostsController from './controllers/hosts';
import hosts from './routes/hosts';
import { HOST_AGENT_VERSION } from './utils/agentVersion';

const app = express();

// Security middleware; the dashboard page uses an inline script
app.use(helmet({ contentSecurityPolicy: false }));
app.use(
  cors({
    origin: config.cors.origins.includes('*') ? '*' : config.cors.origins,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  })
);

// Body parsing middleware
app.use(express.json({ limit: '100kb' }));

const hostRegistry = new HostRegistry(new JsonFileRegistryStorage(config.registry.path));
const addressResolver = new AddressResolver();
const statusPoller = new StatusPoller(hostRegistry);

function logStartupDiagnostics(): void {
  logger.info('Host agent startup diagnostics', {
    buildVersion: HOST_AGENT_VERSION,
    protocolVersion: PROTOCOL_VERSION,
    registryPath: path.resolve(config.registry.path),
    pollIntervalMs: config.network.pollInterval,
    pollTimeoutMs: config.network.pollTimeout,
    wolBroadcast: `${config.wakeOnLan.broadcastAddress}:${config.wakeOnLan.port}`,
    environment: config.server.env,
    nodeRuntime: process.version,
    platform: process.platform,
  });
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  try {
    statusPoller.stop();
    await hostRegistry.close();
    logger.info('Host registry closed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

// Initialize and start the server
async function startServer(): Promise<void> {
  try {
    logStartupDiagnostics();

    // Load the registry file (empty registry when it does not exist yet)
    await hostRegistry.initialize();

    hostsController.setHostRegistry(hostRegistry);
    hostsController.setAddressResolver(addressResolver);
    hostsController.setStatusPoller(statusPoller);

    // Reachability polling runs for the lifetime of the process
    statusPoller.start(config.network.pollInterval);

    // API Documentation
    app.use(
      '/api-docs',
      swaggerUi.serve,
      swaggerUi.setup(specs, {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'LanWake API Documentation',
      })
    );

    // Dashboard
    app.use(express.static(config.server.publicDir));

    // Routes
    app.use('/hosts', hosts);

    /**
     * @swagger
     * /health:
     *   get:
     *     summary: Health check endpoint
     *     tags: [Health]
     *     responses:
     *       200:
     *         description: Service is healthy
     *         content:
     *           application/json:
     *             schema:
     *               $ref: '#/components/schemas/HealthCheck'
     *       503:
     *         description: Registry not loaded or polling stopped
     */
    app.get('/health', healthLimiter, (_req: Request, res: Response) => {
      const registryHealthy = hostRegistry.isLoaded();
      const polling = statusPoller.isRunning();
      const status = registryHealthy && polling ? 'ok' : 'degraded';

      res.status(status === 'ok' ? 200 : 503).json({
        uptime: process.uptime(),
        timestamp: Date.now(),
        status,
        environment: config.server.env,
        build: {
          version: HOST_AGENT_VERSION,
          protocolVersion: PROTOCOL_VERSION,
        },
        checks: {
          registry: registryHealthy ? 'healthy' : 'unhealthy',
          statusPolling: polling ? 'running' : 'stopped',
        },
        hostCount: hostRegistry.size(),
        lastPollTime: statusPoller.getLastPollTime(),
      });
    });

    // 404 handler
    app.use(notFoundHandler);

    // Error handling middleware (must be last)
    app.use(errorHandler);

    const server = app.listen(config.server.port, config.server.host, () => {
      const address = server.address();
      if (typeof address === 'string') {
        logger.info(`LanWake listening at ${address}`);
      } else if (address) {
        logger.info(`LanWake listening at http://${address.address}:${address.port}`);
        logger.info(`Environment: ${config.server.env}`);
      }
    });

    process.on('SIGINT', (signal) => void shutdown(signal));
    process.on('SIGTERM', (signal) => void shutdown(signal));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
