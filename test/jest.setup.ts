import 'reflect-metadata';

// Entity column types are resolved when the entity modules load.
process.env.DB_TYPE = 'sqljs';
