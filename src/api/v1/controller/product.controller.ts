import { Request, Response } from "express";
import { ProductService } from "../service/product.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { parsePositiveInt, validateCreateRequest } from "../validators/product.validation";

export class ProductController {
    static createProduct = requestHandler(async (req: Request, res: Response) => {
        const request = validateCreateRequest(req.body);
        const productId = await ProductService.createProductWithInventory(request);
        sendResponse(res, 201, { message: 'Product created', product_id: productId });
    })

    static getProductById = requestHandler(async (req: Request, res: Response) => {
        const productId = parsePositiveInt(req.params.id, 'id');
        const product = await ProductService.getProductWithInventory(productId);
        sendResponse(res, 200, product);
    })
}
