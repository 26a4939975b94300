import http from 'http';
import app from './api/v1/index';
import { PORT } from './api/v1/config/env';
import logger from './api/v1/utils/logger';


const server = http.createServer(app);

server.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
});
