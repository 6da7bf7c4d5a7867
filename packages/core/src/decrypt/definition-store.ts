/**
 * @module decrypt/definition-store
 * Reads encrypted definitions from the system catalog.
 *
 * The encrypted blob lives in `sys.sysobjvalues`, a hidden system base
 * table that is only readable over the Dedicated Admin Connection, so the
 * pool handed to this store must be a DAC pool.
 */

import * as sql from 'mssql';
import { DecryptionError } from '../core/errors';
import { QualifiedName, QuoteName } from '../db/identifiers';
import { ReadString } from '../db/rows';
import { WithRollback } from '../db/transaction';
import {
  ENCRYPTED_OBJECT_TYPES,
  EncryptedDefinitionStore,
  EncryptedObject,
  EncryptedObjectType,
} from './types';

/**
 * `EncryptedDefinitionStore` over an `mssql` pool connected to one database.
 */
export class SqlDefinitionStore implements EncryptedDefinitionStore {
  private readonly pool: sql.ConnectionPool;
  private readonly database: string;

  /**
   * @param pool - DAC pool connected to `database`
   * @param database - Database the pool is connected to
   */
  constructor(pool: sql.ConnectionPool, database: string) {
    this.pool = pool;
    this.database = database;
  }

  async ListEncryptedObjects(): Promise<EncryptedObject[]> {
    const typeList = ENCRYPTED_OBJECT_TYPES.map((t) => `'${t}'`).join(', ');
    const result = await new sql.Request(this.pool).query(`
      SELECT
        SCHEMA_NAME(o.schema_id) AS schema_name,
        o.name AS object_name,
        RTRIM(o.type) AS object_type,
        SCHEMA_NAME(p.schema_id) AS parent_schema,
        p.name AS parent_name
      FROM sys.sql_modules m
      JOIN sys.objects o ON o.object_id = m.object_id
      LEFT JOIN sys.objects p ON p.object_id = o.parent_object_id
      WHERE m.definition IS NULL
        AND o.is_ms_shipped = 0
        AND RTRIM(o.type) IN (${typeList})
      ORDER BY schema_name, object_name
    `);

    const objects: EncryptedObject[] = [];
    for (const row of result.recordset) {
      const object = MapEncryptedObjectRow(row, this.database);
      if (object) {
        objects.push(object);
      }
    }
    return objects;
  }

  async ReadSecret(object: EncryptedObject): Promise<Buffer> {
    return this.readImageValue(new sql.Request(this.pool), object);
  }

  async ReadKnownSecret(object: EncryptedObject, knownPlainText: string): Promise<Buffer> {
    return WithRollback(new sql.Transaction(this.pool), async (transaction) => {
      await new sql.Request(transaction).batch(knownPlainText);
      return this.readImageValue(new sql.Request(transaction), object);
    });
  }

  private async readImageValue(request: sql.Request, object: EncryptedObject): Promise<Buffer> {
    const name = QualifiedName(object);
    request.input('name', sql.NVarChar(776), name);
    const result = await request.query(`
      SELECT imageval
      FROM sys.sysobjvalues
      WHERE objid = OBJECT_ID(@name)
        AND valclass = 1
        AND subobjid = 1
    `);

    const value: unknown = result.recordset[0]?.imageval;
    if (!Buffer.isBuffer(value)) {
      throw new DecryptionError(
        name,
        `No encrypted definition found for ${name} in ${QuoteName(this.database)}; ` +
          `the object may not exist or the connection is not a dedicated admin connection`
      );
    }
    return value;
  }
}

/**
 * Maps a catalog row to an `EncryptedObject`.
 * Returns null for rows of a kind that cannot be recovered.
 */
export function MapEncryptedObjectRow(row: Record<string, unknown>, database: string): EncryptedObject | null {
  const schema = ReadString(row, 'schema_name');
  const name = ReadString(row, 'object_name');
  const type = ReadString(row, 'object_type');

  if (schema === null || name === null || type === null || !isEncryptedObjectType(type)) {
    return null;
  }

  return {
    Database: database,
    Schema: schema,
    Name: name,
    Type: type,
    ParentSchema: ReadString(row, 'parent_schema'),
    ParentName: ReadString(row, 'parent_name'),
  };
}

function isEncryptedObjectType(value: string): value is EncryptedObjectType {
  return ENCRYPTED_OBJECT_TYPES.some((t) => t === value);
}
