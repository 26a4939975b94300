import express from 'express';
import router from './routes/index';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import cors from 'cors'
import swaggerUi from 'swagger-ui-express'
import { openapiSpec } from './docs/openapi'


const app = express();

app.use(express.json())
app.use(cors())
// Swagger UI
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiSpec, {
  explorer: true,
}))
app.get('/health', (req, res) => {
  res.json({ status: 'ok' });
});
app.use('/api/v1', router);
app.use(notFoundHandler);
app.use(errorHandler);
export default app;
