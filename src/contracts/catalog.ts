import { Cents } from './money';

export interface ProductData {
  productId: string;
  name: string;
  price: Cents;
  description: string;
  imageUrl: string;
}
