/**
 * Unit tests for the MCP tool handlers
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { GenomicsMcpServer, ToolResult } from '../../src/mcp-server/server';
import { SqliteGenomicStore } from '../../src/storage/sqlite-store';
import { createTestRegistry, seedStore } from '../helpers';

const payload = (result: ToolResult): unknown => JSON.parse(result.content[0].text);

describe('GenomicsMcpServer', () => {
  let store: SqliteGenomicStore;
  let server: GenomicsMcpServer;

  beforeEach(() => {
    store = new SqliteGenomicStore({ filename: ':memory:' });
    seedStore(store);
    server = new GenomicsMcpServer({ registry: createTestRegistry(store) });
  });

  afterEach(() => {
    store.close();
  });

  it('returns a patient with gene classifications', async () => {
    const result = await server.callTool('get_patient', { patient_id: 'P2' });

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({
      id: 'P2',
      genes: [{ geneId: 'TP53', mutation: { classification: 'pathogenic', variants: ['G4A'] } }],
    });
  });

  it('reports a missing patient as an error result', async () => {
    const result = await server.callTool('get_patient', { patient_id: 'P9' });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe("Error executing tool get_patient: Patient 'P9' not found");
  });

  it('finds patients by diagnosis', async () => {
    const result = await server.callTool('find_patients', { diagnosis: 'prostate cancer' });

    expect(payload(result)).toMatchObject({ total: 1, patients: [{ id: 'P2' }] });
  });

  it('builds a mutation report from a filter', async () => {
    const result = await server.callTool('mutation_report', {
      filter: { op: 'gene', ids: ['TP53'] },
      top_n: 1,
    });

    expect(payload(result)).toMatchObject({
      totals: [
        { key: 'patients', value: 2 },
        { key: 'geneRecords', value: 2 },
        { key: 'mutationRecords', value: 2 },
      ],
      topMutatedGenes: [{ key: 'TP53', value: 1 }],
    });
  });

  it('classifies without storing', async () => {
    const result = await server.callTool('classify_gene', { patient_id: 'P7', gene_id: 'tp53', expression: 0.1 });

    expect(payload(result)).toMatchObject({ geneRecordId: 'P7/TP53', classification: 'likely-pathogenic', stored: false });
    expect(store.find('patient', 'P7')).toBeUndefined();
  });

  it('describes a catalog gene with its tolerance band', async () => {
    const result = await server.callTool('catalog_info', { gene_id: 'BRCA1' });

    expect(payload(result)).toMatchObject({ geneId: 'BRCA1', oncogene: false, toleranceBand: { lower: 1.2, upper: 10.8 } });
  });

  it('rejects malformed arguments as invalid params', async () => {
    await expect(server.callTool('get_patient', {})).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(server.callTool('mutation_report', { filter: { op: 'xor' } })).rejects.toBeInstanceOf(McpError);
  });

  it('rejects an unknown tool', async () => {
    await expect(server.callTool('drop_tables', {})).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });
});
