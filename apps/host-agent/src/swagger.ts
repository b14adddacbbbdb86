import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { HOST_AGENT_VERSION } from './utils/agentVersion';

const hostProperties = {
  id: { type: 'integer', description: 'Registry id', example: 3 },
  ip: { type: 'string', format: 'ipv4', example: '192.168.1.147' },
  mac: {
    type: 'string',
    description: 'MAC address, empty while unknown',
    example: '80:6D:97:60:39:08',
  },
  name: { type: 'string', example: 'Lab PC 2' },
  user: { type: 'string', example: 'Unknown' },
};

const errorBody = {
  type: 'object',
  properties: {
    error: { type: 'string', example: 'Not Found' },
    message: { type: 'string', example: 'Host 3 not found' },
  },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'LanWake Host Agent API',
      version: HOST_AGENT_VERSION,
      description:
        'Host registry with live reachability status, ARP-based MAC resolution and Wake-on-LAN',
      license: {
        name: 'Apache 2.0',
        url: 'https://www.apache.org/licenses/LICENSE-2.0.html',
      },
    },
    servers: [
      {
        url: 'http://localhost:8082',
        description: 'Development server',
      },
    ],
    tags: [
      { name: 'Hosts', description: 'Host registry endpoints' },
      { name: 'Wake-on-LAN', description: 'Remote host wake-up operations' },
      { name: 'Health', description: 'Service health and status' },
    ],
    components: {
      parameters: {
        HostId: {
          in: 'path',
          name: 'id',
          required: true,
          schema: { type: 'integer', minimum: 1 },
          description: 'Registry id of the host',
        },
      },
      schemas: {
        Host: {
          type: 'object',
          properties: {
            ...hostProperties,
            status: {
              type: 'string',
              enum: ['online', 'offline', 'error'],
              description: 'Outcome of the latest reachability probe',
              example: 'online',
            },
          },
          required: ['id', 'ip', 'mac', 'name', 'user', 'status'],
        },
        HostsResponse: {
          type: 'object',
          properties: {
            hosts: { type: 'array', items: { $ref: '#/components/schemas/Host' } },
            pollInProgress: { type: 'boolean' },
            lastPollTime: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        AddHostRequest: {
          type: 'object',
          required: ['ip'],
          properties: {
            ip: hostProperties.ip,
            mac: { ...hostProperties.mac, description: 'Omit or leave empty to resolve from ARP' },
            name: hostProperties.name,
            user: hostProperties.user,
          },
        },
        UpdateHostRequest: {
          type: 'object',
          properties: {
            ip: hostProperties.ip,
            mac: { ...hostProperties.mac, description: 'Empty string re-resolves from ARP' },
            name: hostProperties.name,
            user: hostProperties.user,
          },
        },
        HostMutationResponse: {
          type: 'object',
          properties: {
            host: { $ref: '#/components/schemas/Host' },
            message: {
              type: 'string',
              example: 'Host added, MAC address resolved: 80:6D:97:60:39:08',
            },
            resolution: {
              type: 'string',
              enum: ['provided', 'resolved', 'failed', 'skipped', 'unchanged'],
            },
          },
        },
        WakeResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean' },
            mac: { type: 'string', example: '80:6D:97:60:39:08' },
            message: { type: 'string', example: 'Packet sent to 80:6D:97:60:39:08' },
            error: {
              type: 'string',
              enum: ['MISSING_MAC', 'INVALID_MAC', 'WOL_SEND_FAILED'],
            },
          },
        },
        HealthCheck: {
          type: 'object',
          properties: {
            uptime: { type: 'number', example: 73.87 },
            timestamp: { type: 'integer', example: 1763544894939 },
            status: { type: 'string', enum: ['ok', 'degraded'] },
            environment: { type: 'string', example: 'development' },
            checks: {
              type: 'object',
              properties: {
                registry: { type: 'string', enum: ['healthy', 'unhealthy'] },
                statusPolling: { type: 'string', enum: ['running', 'stopped'] },
              },
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', example: 'VALIDATION_ERROR' },
                message: { type: 'string', example: '"ip" Required' },
                statusCode: { type: 'integer', example: 400 },
                timestamp: { type: 'string', format: 'date-time' },
                path: { type: 'string', example: '/hosts' },
              },
            },
          },
        },
      },
      responses: {
        BadRequest: {
          description: 'Invalid request parameters',
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
        },
        NotFound: {
          description: 'Host not found',
          content: { 'application/json': { schema: errorBody } },
        },
        TooManyRequests: {
          description: 'Rate limit exceeded',
          content: { 'application/json': { schema: errorBody } },
        },
      },
    },
  },
  apis: [
    path.join(__dirname, 'routes', '*.{ts,js}'),
    path.join(__dirname, 'controllers', '*.{ts,js}'),
    path.join(__dirname, 'app.{ts,js}'),
  ],
};

export const specs = swaggerJsdoc(options);
