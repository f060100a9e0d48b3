// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

export type DatabaseDriver = 'mysql' | 'better-sqlite3';

const parseDriver = (raw: string | undefined): DatabaseDriver =>
  raw === 'better-sqlite3' || raw === 'sqlite' ? 'better-sqlite3' : 'mysql';

/**
 * 数据库配置
 * 生产环境使用 MySQL；本地与测试可切换为内存 SQLite（DB_TYPE=better-sqlite3）
 */
const databaseConfig: ConfigFactory = () => ({
  database: {
    type: parseDriver(process.env.DB_TYPE),
    host: process.env.DB_HOST || '127.0.0.1',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USER || 'root',
    password: process.env.DB_PASS || '',
    // SQLite 下为文件路径，':memory:' 表示内存库
    database: process.env.DB_NAME || 'course_enrollment',
    timezone: process.env.DB_TIMEZONE || '+00:00',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    charset: 'utf8mb4',
    extra: {
      connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
    },
  },
});

export default databaseConfig;
