import { Router } from 'express';
import { AlertController } from '../controller/alert.controller';

const router = Router();

router
    .get('/:companyId/alerts/low-stock', AlertController.getLowStockAlerts)

export default router;
