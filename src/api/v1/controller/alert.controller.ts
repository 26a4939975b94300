import { Request, Response } from "express";
import { LowStockAlertService } from "../service/lowStockAlert.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { parsePositiveInt } from "../validators/product.validation";

const MAX_WINDOW_DAYS = 365;

export class AlertController {
    static getLowStockAlerts = requestHandler(async (req: Request, res: Response) => {
        const companyId = parsePositiveInt(req.params.companyId, 'companyId');
        const windowDays = req.query.window_days === undefined
            ? undefined
            : parsePositiveInt(req.query.window_days, 'window_days', MAX_WINDOW_DAYS);

        const report = await LowStockAlertService.getLowStockAlerts(companyId, { windowDays });
        sendResponse(res, 200, report);
    })
}
