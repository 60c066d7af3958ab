/**
 * Tests for the issue metadata service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockHttpTransport } from '../mocks/index.js';
import { IssueMetadataService } from '../services/issue-metadata.js';
import { NoIssueKeyOrIdError } from '../errors/index.js';
import { isJsonObject } from '../types/index.js';
import { TestContext, captureError, createTestClient } from './helpers.js';

const editMeta = {
  fields: {
    summary: {
      required: true,
      schema: { type: 'string', system: 'summary' },
      name: 'Summary',
      key: 'summary',
      operations: ['set'],
    },
  },
};

describe('IssueMetadataService', () => {
  let ctx: TestContext;
  let transport: MockHttpTransport;
  let service: IssueMetadataService;

  beforeEach(() => {
    ctx = createTestClient();
    transport = ctx.transport;
    service = ctx.client.issueMetadata;
  });

  describe('get', () => {
    it('should get edit metadata as a JSON tree', async () => {
      transport.mockJson('TEST-1/editmeta', editMeta);

      const { data, response } = await service.get('TEST-1');

      expect(response.endpoint).toBe('rest/api/2/issue/TEST-1/editmeta');
      expect(isJsonObject(data)).toBe(true);
      expect(data).toEqual(editMeta);
    });

    it('should add both override flags when set', async () => {
      transport.mockJson('TEST-1/editmeta', editMeta);

      const { response } = await service.get('TEST-1', true, true);

      expect(response.endpoint).toBe(
        'rest/api/2/issue/TEST-1/editmeta?overrideEditableFlag=true&overrideScreenSecurity=true'
      );
    });

    it('should add only the flags that are set', async () => {
      transport.mockJson('TEST-1/editmeta', editMeta);

      const { response } = await service.get('TEST-1', true, false);

      expect(response.endpoint).toBe('rest/api/2/issue/TEST-1/editmeta?overrideScreenSecurity=true');
    });

    it('should reject an empty issue key', async () => {
      const error = await captureError(service.get('  '), NoIssueKeyOrIdError);

      expect(error.message).toBe('Issue key or ID is required');
      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('create', () => {
    it('should repeat keys for each filter value', async () => {
      transport.mockJson('issue/createmeta', { projects: [] });

      const { data, response } = await service.create({
        projectKeys: ['TEST', 'OPS'],
        issueTypeNames: ['Bug'],
        expand: 'projects.issuetypes.fields',
      });

      expect(response.endpoint).toBe(
        'rest/api/2/issue/createmeta?projectKeys=TEST&projectKeys=OPS&issuetypeNames=Bug&expand=projects.issuetypes.fields'
      );
      expect(data).toEqual({ projects: [] });
    });

    it('should send the filters in a fixed order', async () => {
      transport.mockJson('issue/createmeta', { projects: [] });

      const { response } = await service.create({
        issueTypeIds: ['10001'],
        projectIds: ['10002'],
      });

      expect(response.endpoint).toBe('rest/api/2/issue/createmeta?projectIds=10002&issuetypeIds=10001');
    });

    it('should send no query without options', async () => {
      transport.mockJson('issue/createmeta', { projects: [] });

      const { response } = await service.create();

      expect(response.endpoint).toBe('rest/api/2/issue/createmeta');
      expect(transport.lastCall()?.method).toBe('GET');
    });
  });
});
