export type ProductEvent =
  | ProductCreated
  | ProductUpdated
  | StockUpdated
  | ProductActivated
  | ProductDeactivated
  | ProductDeleted;

export interface ProductCreated {
  readonly type: 'product.created';
  readonly productId: string;
  readonly name: string;
  readonly category: string;
  readonly price: number;
  readonly stock: number;
  readonly createdAt: Date;
}

export interface ProductUpdated {
  readonly type: 'product.updated';
  readonly productId: string;
  readonly name: string;
  readonly category: string;
  readonly price: number;
  readonly stock: number;
  readonly updatedAt: Date;
}

export interface StockUpdated {
  readonly type: 'product.stock.updated';
  readonly productId: string;
  readonly name: string;
  readonly oldStock: number;
  readonly newStock: number;
  readonly updatedAt: Date;
}

export interface ProductActivated {
  readonly type: 'product.activated';
  readonly productId: string;
  readonly name: string;
  readonly activatedAt: Date;
}

export interface ProductDeactivated {
  readonly type: 'product.deactivated';
  readonly productId: string;
  readonly name: string;
  readonly deactivatedAt: Date;
}

export interface ProductDeleted {
  readonly type: 'product.deleted';
  readonly productId: string;
  readonly name: string;
  readonly deletedAt: Date;
}
