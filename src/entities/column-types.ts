import { ColumnType } from 'typeorm';

// Decorators run when entity modules load, before ConfigModule reads .env,
// so the driver is taken straight from the process environment.
const sqlite = process.env.DB_TYPE === 'sqljs';

/** Document text can exceed MySQL's 64 KiB `text`. */
export const LONG_TEXT: ColumnType = sqlite ? 'text' : 'longtext';

/** Uploaded files are capped at 50 MiB by default; `blob` holds 64 KiB in MySQL. */
export const LONG_BLOB: ColumnType = sqlite ? 'blob' : 'longblob';
