// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

const databaseConfig: ConfigFactory = () => ({
  mysql: {
    host: process.env.DB_HOST || '127.0.0.1',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USER || 'root',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_NAME || 'institute',
    timezone: process.env.DB_TIMEZONE || '+05:30',
    charset: 'utf8mb4',
    // 仅开发环境允许自动同步表结构
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    extra: {
      connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
    },
  },
});

export default databaseConfig;
