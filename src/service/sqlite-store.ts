import {
  changes,
  isRecord,
  isUniqueViolation,
  namedArgs,
  parseJsonColumn,
  readEnum,
  readNumber,
  readString,
  type SqliteDatabase,
} from '../storage/sqlite';
import { serviceAlreadyExists, serviceNotFound } from './errors';
import {
  type ModelService,
  RESOURCE_CLASSES,
  type ServiceFilter,
  type ServicePage,
  SERVICE_STATUSES,
  type ServiceStore,
} from './types';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS services (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  model_id TEXT NOT NULL,
  status TEXT NOT NULL,
  replicas INTEGER NOT NULL DEFAULT 1,
  resource_class TEXT NOT NULL DEFAULT 'medium',
  endpoints TEXT NOT NULL DEFAULT '[]',
  active_replicas INTEGER NOT NULL DEFAULT 0,
  config TEXT NOT NULL DEFAULT '{}',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_services_model_id ON services(model_id);
CREATE INDEX IF NOT EXISTS idx_services_status ON services(status);
`;

function rowToService(row: unknown): ModelService {
  if (!isRecord(row)) throw new Error('unexpected service row');
  const endpoints = parseJsonColumn(readString(row, 'endpoints'));
  const config = parseJsonColumn(readString(row, 'config'));
  return {
    id: readString(row, 'id'),
    name: readString(row, 'name'),
    model_id: readString(row, 'model_id'),
    status: readEnum(row, 'status', SERVICE_STATUSES, 'failed'),
    replicas: readNumber(row, 'replicas'),
    resource_class: readEnum(row, 'resource_class', RESOURCE_CLASSES, 'medium'),
    endpoints: Array.isArray(endpoints) ? endpoints.filter((e): e is string => typeof e === 'string') : [],
    active_replicas: readNumber(row, 'active_replicas'),
    config: isRecord(config) ? config : {},
    created_at: readNumber(row, 'created_at'),
    updated_at: readNumber(row, 'updated_at'),
  };
}

function serviceParams(service: ModelService): Record<string, string | number> {
  return {
    id: service.id,
    name: service.name,
    model_id: service.model_id,
    status: service.status,
    replicas: service.replicas,
    resource_class: service.resource_class,
    endpoints: JSON.stringify(service.endpoints),
    active_replicas: service.active_replicas,
    config: JSON.stringify(service.config),
    created_at: service.created_at,
    updated_at: service.updated_at,
  };
}

export class SqliteServiceStore implements ServiceStore {
  constructor(private readonly db: SqliteDatabase) {
    db.exec(SCHEMA);
  }

  async create(service: ModelService): Promise<void> {
    try {
      this.db
        .query(
          `INSERT INTO services (id, name, model_id, status, replicas, resource_class, endpoints, active_replicas, config, created_at, updated_at)
           VALUES (@id, @name, @model_id, @status, @replicas, @resource_class, @endpoints, @active_replicas, @config, @created_at, @updated_at)`,
        )
        .run(serviceParams(service));
    } catch (error) {
      if (isUniqueViolation(error)) throw serviceAlreadyExists(service.id);
      throw error;
    }
  }

  async get(id: string): Promise<ModelService> {
    const row = this.db.query('SELECT * FROM services WHERE id = ?').get(id);
    if (!row) throw serviceNotFound(id);
    return rowToService(row);
  }

  async list(filter: ServiceFilter = {}): Promise<ServicePage> {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};
    if (filter.status) {
      clauses.push('status = @status');
      params.status = filter.status;
    }
    if (filter.model_id) {
      clauses.push('model_id = @model_id');
      params.model_id = filter.model_id;
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const countRow = this.db.query(`SELECT COUNT(*) AS total FROM services ${where}`).get(...namedArgs(params));
    const total = isRecord(countRow) ? readNumber(countRow, 'total') : 0;
    params.limit = filter.limit && filter.limit > 0 ? filter.limit : -1;
    params.offset = Math.max(0, filter.offset ?? 0);
    const rows = this.db
      .query(`SELECT * FROM services ${where} ORDER BY rowid ASC LIMIT @limit OFFSET @offset`)
      .all(params);
    return { items: rows.map(rowToService), total };
  }

  async update(service: ModelService): Promise<void> {
    const result = this.db
      .query(
        `UPDATE services SET name = @name, model_id = @model_id, status = @status, replicas = @replicas,
           resource_class = @resource_class, endpoints = @endpoints, active_replicas = @active_replicas,
           config = @config, created_at = @created_at, updated_at = @updated_at
         WHERE id = @id`,
      )
      .run(serviceParams(service));
    if (changes(result) === 0) throw serviceNotFound(service.id);
  }

  async delete(id: string): Promise<void> {
    const result = this.db.query('DELETE FROM services WHERE id = ?').run(id);
    if (changes(result) === 0) throw serviceNotFound(id);
  }
}
