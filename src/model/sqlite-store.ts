import { z } from 'zod';
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
import { createLogger } from '../utils/logger';
import { modelAlreadyExists, modelNotFound } from './errors';
import { assertModelId } from './store';
import {
  MODEL_FORMATS,
  MODEL_STATUSES,
  MODEL_TYPES,
  type Model,
  type ModelFilter,
  type ModelPage,
  ModelRequirementsSchema,
  type ModelStore,
} from './types';

const logger = createLogger('model-sqlite-store');

const SCHEMA = `
CREATE TABLE IF NOT EXISTS models (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  type TEXT NOT NULL,
  format TEXT NOT NULL,
  status TEXT NOT NULL,
  source TEXT NOT NULL DEFAULT '',
  path TEXT NOT NULL DEFAULT '',
  size INTEGER NOT NULL DEFAULT 0,
  checksum TEXT NOT NULL DEFAULT '',
  metadata TEXT NOT NULL DEFAULT '{}',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_models_type ON models(type);
CREATE INDEX IF NOT EXISTS idx_models_status ON models(status);
CREATE INDEX IF NOT EXISTS idx_models_name ON models(name);
`;

/** Requirements and tags live together in the `metadata` column. */
const ModelMetadataSchema = z.object({
  requirements: ModelRequirementsSchema.optional(),
  tags: z.array(z.string()).default([]),
});

function rowToModel(row: unknown): Model {
  if (!isRecord(row)) throw new Error('unexpected model row');
  const metadata = ModelMetadataSchema.safeParse(parseJsonColumn(readString(row, 'metadata')) ?? {});
  if (!metadata.success) {
    logger.warn('unreadable model metadata', { id: row.id });
  }
  const model: Model = {
    id: readString(row, 'id'),
    name: readString(row, 'name'),
    type: readEnum(row, 'type', MODEL_TYPES, 'llm'),
    format: readEnum(row, 'format', MODEL_FORMATS, 'safetensors'),
    status: readEnum(row, 'status', MODEL_STATUSES, 'error'),
    source: readString(row, 'source'),
    path: readString(row, 'path'),
    size: readNumber(row, 'size'),
    checksum: readString(row, 'checksum'),
    tags: metadata.success ? metadata.data.tags : [],
    created_at: readNumber(row, 'created_at'),
    updated_at: readNumber(row, 'updated_at'),
  };
  if (metadata.success && metadata.data.requirements) model.requirements = metadata.data.requirements;
  return model;
}

function modelParams(model: Model): Record<string, string | number> {
  const metadata: z.input<typeof ModelMetadataSchema> = { tags: model.tags };
  if (model.requirements) metadata.requirements = model.requirements;
  return {
    id: model.id,
    name: model.name,
    type: model.type,
    format: model.format,
    status: model.status,
    source: model.source,
    path: model.path,
    size: model.size,
    checksum: model.checksum,
    metadata: JSON.stringify(metadata),
    created_at: model.created_at,
    updated_at: model.updated_at,
  };
}

export class SqliteModelStore implements ModelStore {
  constructor(private readonly db: SqliteDatabase) {
    db.exec(SCHEMA);
  }

  async create(model: Model): Promise<void> {
    assertModelId(model.id);
    try {
      this.db
        .query(
          `INSERT INTO models (id, name, type, format, status, source, path, size, checksum, metadata, created_at, updated_at)
           VALUES (@id, @name, @type, @format, @status, @source, @path, @size, @checksum, @metadata, @created_at, @updated_at)`,
        )
        .run(modelParams(model));
    } catch (error) {
      if (isUniqueViolation(error)) throw modelAlreadyExists(model.id);
      throw error;
    }
  }

  async get(id: string): Promise<Model> {
    const row = this.db.query('SELECT * FROM models WHERE id = ?').get(id);
    if (!row) throw modelNotFound(id);
    return rowToModel(row);
  }

  async list(filter: ModelFilter = {}): Promise<ModelPage> {
    const clauses: string[] = [];
    const params: Record<string, string | number> = {};
    if (filter.type) {
      clauses.push('type = @type');
      params.type = filter.type;
    }
    if (filter.status) {
      clauses.push('status = @status');
      params.status = filter.status;
    }
    if (filter.format) {
      clauses.push('format = @format');
      params.format = filter.format;
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const countRow = this.db.query(`SELECT COUNT(*) AS total FROM models ${where}`).get(...namedArgs(params));
    const total = isRecord(countRow) ? readNumber(countRow, 'total') : 0;
    params.limit = filter.limit && filter.limit > 0 ? filter.limit : -1;
    params.offset = Math.max(0, filter.offset ?? 0);
    const rows = this.db
      .query(`SELECT * FROM models ${where} ORDER BY rowid ASC LIMIT @limit OFFSET @offset`)
      .all(params);
    return { items: rows.map(rowToModel), total };
  }

  async update(model: Model): Promise<void> {
    const result = this.db
      .query(
        `UPDATE models SET name = @name, type = @type, format = @format, status = @status, source = @source,
           path = @path, size = @size, checksum = @checksum, metadata = @metadata,
           created_at = @created_at, updated_at = @updated_at
         WHERE id = @id`,
      )
      .run(modelParams(model));
    if (changes(result) === 0) throw modelNotFound(model.id);
  }

  async delete(id: string): Promise<void> {
    const result = this.db.query('DELETE FROM models WHERE id = ?').run(id);
    if (changes(result) === 0) throw modelNotFound(id);
  }
}
