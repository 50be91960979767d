import { FastifyInstance } from 'fastify';
import { NotFoundError } from '@/contracts';
import { userContextMiddleware } from '@/api/middleware/userContext';
import { sendError } from '@/api/errors';
import { serializeOrder } from '@/api/serializers';

export async function orderRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /orders/:orderId: another user's order is reported as not found
  fastify.get<{ Params: { orderId: string } }>('/orders/:orderId', {
    preHandler: userContextMiddleware,
  }, async (request, reply) => {
    const { orderId } = request.params;
    try {
      const order = await fastify.stores.orders.getOrder(orderId);
      if (!order || order.userId !== request.userId) throw new NotFoundError('order', orderId);
      return reply.send({ order: serializeOrder(order) });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });
}
