import { Router } from 'express';
import { ProductController } from '../controller/product.controller';

const router = Router();

router
    .get('/:id', ProductController.getProductById)
    .post('/', ProductController.createProduct)

export default router;
