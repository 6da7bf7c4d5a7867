import { describe, it, expect } from 'vitest';
import { BuildIndexInfoQuery, COLUMN_LIST_SEPARATOR, MapIndexInfoRow } from '../metadata/index-info';

describe('BuildIndexInfoQuery', () => {
  it('excludes heaps and system objects by default', () => {
    const query = BuildIndexInfoQuery();

    expect(query.SQL).toContain('o.is_ms_shipped = 0');
    expect(query.SQL).toContain("o.type IN ('U', 'V')");
    expect(query.SQL).toContain('i.index_id > 0');
    expect(query.SQL).not.toContain('@objectName');
    expect(query.ObjectName).toBeNull();
  });

  it('includes statistics dates by default', () => {
    expect(BuildIndexInfoQuery().SQL).toContain('STATS_DATE(i.object_id, i.index_id) AS stats_last_updated');
  });

  it('filters to one object through a parameter', () => {
    const query = BuildIndexInfoQuery({ ObjectName: '[dbo].[Orders]' });

    expect(query.SQL).toContain('i.object_id = OBJECT_ID(@objectName)');
    expect(query.SQL).not.toContain('Orders');
    expect(query.ObjectName).toBe('[dbo].[Orders]');
  });

  it('includes heaps on request', () => {
    expect(BuildIndexInfoQuery({ IncludeHeaps: true }).SQL).not.toContain('i.index_id > 0');
  });

  it('skips statistics dates on request', () => {
    const sql = BuildIndexInfoQuery({ IncludeStats: false }).SQL;
    expect(sql).toContain('CAST(NULL AS DATETIME) AS stats_last_updated');
    expect(sql).not.toContain('STATS_DATE');
  });
});

describe('MapIndexInfoRow', () => {
  const statsDate = new Date('2026-03-01T04:00:00Z');

  it('maps a full row', () => {
    const info = MapIndexInfoRow(
      {
        schema_name: 'dbo',
        object_name: 'OrderLines',
        index_name: 'PK_OrderLines',
        index_type: 'CLUSTERED',
        is_unique: true,
        is_primary_key: true,
        is_disabled: false,
        fill_factor: 90,
        key_columns: `OrderID${COLUMN_LIST_SEPARATOR}LineNo`,
        included_columns: `Qty${COLUMN_LIST_SEPARATOR}Price`,
        row_count: '1200',
        user_seeks: 15,
        user_scans: 2,
        user_lookups: 0,
        user_updates: 40,
        stats_last_updated: statsDate,
      },
      'Sales'
    );

    expect(info).toEqual({
      Database: 'Sales',
      Schema: 'dbo',
      Object: 'OrderLines',
      Index: 'PK_OrderLines',
      IndexType: 'CLUSTERED',
      KeyColumns: ['OrderID', 'LineNo'],
      IncludedColumns: ['Qty', 'Price'],
      IsUnique: true,
      IsPrimaryKey: true,
      IsDisabled: false,
      FillFactor: 90,
      RowCount: 1200,
      UserSeeks: 15,
      UserScans: 2,
      UserLookups: 0,
      UserUpdates: 40,
      StatsLastUpdated: statsDate,
    });
  });

  it('maps a heap with no usage to empty lists and zero counters', () => {
    const info = MapIndexInfoRow(
      {
        schema_name: 'stage',
        object_name: 'RawImport',
        index_name: null,
        index_type: 'HEAP',
        is_unique: false,
        is_primary_key: false,
        is_disabled: false,
        fill_factor: 0,
        key_columns: null,
        included_columns: null,
        row_count: null,
        user_seeks: null,
        user_scans: null,
        user_lookups: null,
        user_updates: null,
        stats_last_updated: null,
      },
      'Sales'
    );

    expect(info.Index).toBeNull();
    expect(info.KeyColumns).toEqual([]);
    expect(info.IncludedColumns).toEqual([]);
    expect(info.RowCount).toBe(0);
    expect(info.UserSeeks).toBe(0);
    expect(info.StatsLastUpdated).toBeNull();
  });

  it('keeps column names containing commas intact', () => {
    const info = MapIndexInfoRow({ key_columns: `Last, First${COLUMN_LIST_SEPARATOR}ID` }, 'Sales');
    expect(info.KeyColumns).toEqual(['Last, First', 'ID']);
  });
});
