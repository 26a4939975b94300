export * from './company';
export * from './warehouse';
export * from './supplier';
export * from './product';
export * from './inventory';
export * from './inventoryChange';
