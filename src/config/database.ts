import { DataSource } from "typeorm";
import { Site } from "../entities/Site";
import { Update } from "../entities/Update";
import { DatabaseConfig } from "./index";

export const entities = [Site, Update];

export function createDataSource(db: DatabaseConfig): DataSource {
    if (db.type === 'sqlite') {
        return new DataSource({
            type: "better-sqlite3",
            database: db.path,
            synchronize: true, // schema follows the entities, as with postgres below
            logging: false,
            entities,
        });
    }

    return new DataSource({
        type: "postgres",
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.database,
        synchronize: true,
        logging: false,
        entities,
        subscribers: [],
        migrations: [],
    });
}

export function isSingleConnection(dataSource: DataSource): boolean {
    const { type } = dataSource.options;
    return type === 'better-sqlite3' || type === 'sqlite';
}
