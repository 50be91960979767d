import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { NotFoundError, ValidationError } from '@/contracts';
import { userContextMiddleware } from '@/api/middleware/userContext';
import { addCartLineSchema, productIdParamsSchema, setCartQuantitySchema } from '@/api/validators/cart';
import { sendError } from '@/api/errors';
import { serializeCartLine } from '@/api/serializers';
import { addLine, listLines, removeLine, setQuantity } from '@/cart/cartService';

export async function cartRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /cart: the cart is whatever lines the user currently has
  fastify.get('/cart', {
    preHandler: userContextMiddleware,
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const lines = await listLines(fastify.stores, request.userId);
      return reply.send({ userId: request.userId, lines: lines.map(serializeCartLine) });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });

  // POST /cart: upsert one line
  fastify.post('/cart', {
    preHandler: userContextMiddleware,
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const parsed = addCartLineSchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid input', parsed.error.errors);
      }
      const { productId, quantity } = parsed.data;

      const product = await fastify.stores.catalog.getProduct(productId);
      if (!product) throw new NotFoundError('product', productId);

      const line = await addLine(fastify.stores, request.userId, productId, quantity);
      return reply.send({ line: serializeCartLine(line) });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });

  // PUT /cart/:productId: set quantity, 0 removes the line
  fastify.put('/cart/:productId', {
    preHandler: userContextMiddleware,
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const params = productIdParamsSchema.safeParse(request.params);
      const body = setCartQuantitySchema.safeParse(request.body);
      if (!params.success) throw new ValidationError('Invalid productId', params.error.errors);
      if (!body.success) throw new ValidationError('Invalid input', body.error.errors);

      const line = await setQuantity(fastify.stores, request.userId, params.data.productId, body.data.quantity);
      return reply.send({ line: line ? serializeCartLine(line) : null });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });

  // DELETE /cart/:productId: idempotent
  fastify.delete('/cart/:productId', {
    preHandler: userContextMiddleware,
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const params = productIdParamsSchema.safeParse(request.params);
      if (!params.success) throw new ValidationError('Invalid productId', params.error.errors);

      await removeLine(fastify.stores, request.userId, params.data.productId);
      return reply.status(204).send();
    } catch (err) {
      return sendError(request, reply, err);
    }
  });
}
