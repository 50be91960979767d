import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { NotFoundError } from '@/contracts';
import { sendError } from '@/api/errors';
import { serializeProduct } from '@/api/serializers';

export async function productRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /products: catalog pass-through
  fastify.get('/products', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const products = await fastify.stores.catalog.listProducts();
      return reply.send({ products: products.map(serializeProduct) });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });

  // GET /products/:productId
  fastify.get('/products/:productId', async (request: FastifyRequest<{ Params: { productId: string } }>, reply: FastifyReply) => {
    const { productId } = request.params;
    try {
      const product = await fastify.stores.catalog.getProduct(productId);
      if (!product) throw new NotFoundError('product', productId);
      return reply.send({ product: serializeProduct(product) });
    } catch (err) {
      return sendError(request, reply, err);
    }
  });
}
