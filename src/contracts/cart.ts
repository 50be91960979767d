export interface CartLineData {
  userId: string;
  productId: string;
  quantity: number;
  updatedAt: Date;
}

export interface DeleteLineOptions {
  // Skip the delete when the line was modified after this instant
  unmodifiedSince?: Date;
}
