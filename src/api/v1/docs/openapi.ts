import swaggerJSDoc from 'swagger-jsdoc';

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

// Base Swagger/OpenAPI configuration
const options: swaggerJSDoc.Options = {
  definition: {
    openapi: '3.0.3',
    info: {
      title: 'Warehouse Inventory API',
      version: '1.0.0',
      description:
        'Multi-warehouse product inventory.\n\nCreates products together with their per-warehouse stock in one transaction and reports actionable low-stock alerts per company.',
      contact: { name: 'API Support' },
    },
    servers: [
      { url: '/api/v1', description: 'API v1 base path' },
    ],
    tags: [
      { name: 'Products', description: 'Product creation and lookup' },
      { name: 'Alerts', description: 'Low-stock alerts' },
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            error: { type: 'string', example: 'price: must be a non-negative decimal amount with at most 2 fractional digits' },
          },
        },
        WarehouseQuantity: {
          type: 'object',
          required: ['warehouse_id', 'quantity'],
          properties: {
            warehouse_id: { type: 'integer', example: 1 },
            quantity: { type: 'integer', minimum: 0, example: 50 },
          },
        },
        ProductCreate: {
          type: 'object',
          required: ['name', 'sku', 'price', 'warehouse_quantities'],
          properties: {
            name: { type: 'string', example: 'Widget A' },
            sku: { type: 'string', example: 'WID-001' },
            price: {
              oneOf: [{ type: 'string', example: '19.99' }, { type: 'number', example: 19.99 }],
              description: 'Exact decimal amount, at most 2 fractional digits',
            },
            supplier_id: { type: 'integer', nullable: true, example: 1 },
            low_stock_threshold: { type: 'integer', nullable: true, minimum: 0, example: 20 },
            warehouse_quantities: {
              type: 'array',
              minItems: 1,
              items: { $ref: '#/components/schemas/WarehouseQuantity' },
            },
          },
        },
        ProductWithInventory: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            sku: { type: 'string' },
            price: { type: 'string', example: '19.99' },
            low_stock_threshold: { type: 'integer', nullable: true },
            supplier_id: { type: 'integer', nullable: true },
            inventory: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  id: { type: 'integer' },
                  warehouse_id: { type: 'integer' },
                  quantity: { type: 'integer' },
                },
              },
            },
          },
        },
        Alert: {
          type: 'object',
          properties: {
            product_id: { type: 'integer', example: 123 },
            product_name: { type: 'string', example: 'Widget A' },
            sku: { type: 'string', example: 'WID-001' },
            warehouse_id: { type: 'integer', example: 456 },
            warehouse_name: { type: 'string', example: 'Main Warehouse' },
            current_stock: { type: 'integer', example: 5 },
            threshold: { type: 'integer', example: 20 },
            days_until_stockout: { type: 'integer', nullable: true, example: 12 },
            supplier: {
              type: 'object',
              properties: {
                id: { type: 'integer', example: 789 },
                name: { type: 'string', example: 'Supplier Corp' },
                contact_email: { type: 'string', nullable: true, example: 'orders@supplier.example' },
              },
            },
          },
        },
      },
    },
    paths: {
      '/products': {
        post: {
          tags: ['Products'],
          summary: 'Create a product with its initial stock in one or more warehouses',
          requestBody: {
            required: true,
            content: { 'application/json': { schema: { $ref: '#/components/schemas/ProductCreate' } } },
          },
          responses: {
            201: {
              description: 'Product created',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      message: { type: 'string', example: 'Product created' },
                      product_id: { type: 'integer', example: 1 },
                    },
                  },
                },
              },
            },
            400: errorResponse('Invalid field or unknown warehouse/supplier'),
            409: errorResponse('SKU already exists'),
            500: errorResponse('Unexpected failure'),
          },
        },
      },
      '/products/{id}': {
        get: {
          tags: ['Products'],
          summary: 'Get a product with its per-warehouse stock',
          parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'integer' } }],
          responses: {
            200: {
              description: 'Product',
              content: { 'application/json': { schema: { $ref: '#/components/schemas/ProductWithInventory' } } },
            },
            400: errorResponse('Invalid id'),
            404: errorResponse('Product not found'),
          },
        },
      },
      '/companies/{companyId}/alerts/low-stock': {
        get: {
          tags: ['Alerts'],
          summary: 'Understocked products with recent sales across the company warehouses',
          parameters: [
            { name: 'companyId', in: 'path', required: true, schema: { type: 'integer' } },
            { name: 'window_days', in: 'query', required: false, schema: { type: 'integer', minimum: 1, maximum: 365, default: 30 } },
          ],
          responses: {
            200: {
              description: 'Low-stock alerts',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      alerts: { type: 'array', items: { $ref: '#/components/schemas/Alert' } },
                      total_alerts: { type: 'integer', example: 1 },
                    },
                  },
                },
              },
            },
            400: errorResponse('Invalid company id or window'),
          },
        },
      },
    },
  },
  apis: [],
};

export const openapiSpec = swaggerJSDoc(options);
