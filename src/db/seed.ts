import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ProductData } from '@/contracts';
import { closeRedisClient } from '@/config/redis';
import { parseMoney } from '@/lib/money';
import { getStores } from './client';

const seedSchema = z.array(z.object({
  productId: z.string().min(1),
  name: z.string().min(1),
  price: z.union([z.string(), z.number()]),
  description: z.string().default(''),
  imageUrl: z.string().default(''),
}));

export function loadSeedProducts(file: string = path.resolve(__dirname, '../../data/products.json')): ProductData[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return seedSchema.parse(raw).map((p) => ({ ...p, price: parseMoney(p.price) }));
}

async function main() {
  const { catalog } = getStores();
  const products = loadSeedProducts();
  for (const product of products) {
    await catalog.putProduct(product);
  }
  console.log(JSON.stringify({ level: 'info', message: 'Seeded catalog', count: products.length }));
}

if (require.main === module) {
  main()
    .then(() => closeRedisClient())
    .catch((err) => {
      console.error(JSON.stringify({ level: 'error', message: 'Seed failed', error: String(err) }));
      process.exit(1);
    });
}
