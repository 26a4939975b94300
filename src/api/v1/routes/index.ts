import { Router } from 'express';
import productRoutes from './product.route'
import companyRoutes from './company.route'

const router = Router();

router.use("/products", productRoutes);
router.use("/companies", companyRoutes);

export default router;
