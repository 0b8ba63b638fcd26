import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { createPostgresPool } from '../src/db/pool';

dotenv.config();

const SCHEMA_PATH = path.join(__dirname, '..', 'db', 'schema.sql');

async function main() {
    const config = loadConfig();
    const pool = createPostgresPool(config.databaseUrl, 1);

    try {
        const sql = fs.readFileSync(SCHEMA_PATH, 'utf8');
        console.log(`Applying ${SCHEMA_PATH}...`);
        await pool.query(sql);
        console.log('Schema is up to date.');
    } finally {
        await pool.end();
    }
}

main().catch(e => {
    console.error(e);
    process.exit(1);
});
