export { SqliteStorageGateway } from "./sqliteStorageGateway";
