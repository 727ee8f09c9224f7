import { FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../config';
import { MarketplaceDependencies } from '../config/dependencies';
import { register } from '../utils/metrics';

export class HealthController {
  constructor(private readonly deps: MarketplaceDependencies) {}

  async health(_request: FastifyRequest, reply: FastifyReply) {
    reply.send({
      status: 'healthy',
      service: config.serviceName,
      paused: this.deps.ledger.isPaused(),
      timestamp: new Date().toISOString()
    });
  }

  async metrics(_request: FastifyRequest, reply: FastifyReply) {
    const body = await register.metrics();
    reply.header('Content-Type', register.contentType).send(body);
  }
}
