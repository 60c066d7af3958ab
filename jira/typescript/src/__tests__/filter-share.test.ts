/**
 * Tests for the filter sharing service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockHttpTransport } from '../mocks/index.js';
import { FilterShareService } from '../services/filter-share.js';
import { InvalidScopeError, NoFilterIdError, ValidationError, JiraErrorCode } from '../errors/index.js';
import { SHARE_SCOPES } from '../types/filter.js';
import { TEST_SITE_URL, sharePermissionFixtures } from '../fixtures/index.js';
import { TestContext, captureError, createTestClient } from './helpers.js';

describe('FilterShareService', () => {
  let ctx: TestContext;
  let transport: MockHttpTransport;
  let service: FilterShareService;

  beforeEach(() => {
    ctx = createTestClient();
    transport = ctx.transport;
    service = ctx.client.filterShare;
  });

  describe('scope', () => {
    it('should get the default share scope', async () => {
      transport.mockJson({ url: 'filter/defaultShareScope', method: 'GET' }, { scope: 'AUTHENTICATED' });

      const { data, response } = await service.scope();

      expect(data.scope).toBe('AUTHENTICATED');
      expect(response.endpoint).toBe('rest/api/2/filter/defaultShareScope');
    });
  });

  describe('setScope', () => {
    it('should send the scope as a JSON body', async () => {
      transport.mockJson({ url: 'filter/defaultShareScope', method: 'PUT' }, { scope: 'PRIVATE' });

      const response = await service.setScope('PRIVATE');

      const call = transport.lastCall();
      expect(call?.method).toBe('PUT');
      expect(call?.url).toBe(`${TEST_SITE_URL}/rest/api/2/filter/defaultShareScope`);
      expect(call?.body).toBe('{"scope":"PRIVATE"}');
      expect(call?.headers['Content-Type']).toBe('application/json');
      expect(response.status).toBe(200);
    });

    it.each(SHARE_SCOPES)('should send exactly one PUT for %s', async (scope) => {
      transport.mockStatus({ url: 'filter/defaultShareScope', method: 'PUT' }, 204);

      await service.setScope(scope);

      const calls = transport.getCalls();
      expect(calls).toHaveLength(1);
      expect(calls[0].method).toBe('PUT');
      expect(calls[0].body).toBe(`{"scope":"${scope}"}`);
    });

    it('should reject a scope outside the allowed set without sending', async () => {
      const error = await captureError(service.setScope('EVERYONE'), InvalidScopeError);

      expect(error.message).toBe('Invalid share scope "EVERYONE", expected one of: GLOBAL, AUTHENTICATED, PRIVATE');
      expect(error.code).toBe(JiraErrorCode.InvalidScope);
      expect(error.response).toBeUndefined();
      expect(transport.getCalls()).toHaveLength(0);
    });

    it('should treat scopes as case-sensitive', async () => {
      await captureError(service.setScope('global'), InvalidScopeError);

      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('gets', () => {
    it('should list share permissions of a filter', async () => {
      const permissions = [sharePermissionFixtures.group(), sharePermissionFixtures.project()];
      transport.mockJson('filter/10000/permission', permissions);

      const { data, response } = await service.gets(10000);

      expect(data).toEqual(permissions);
      expect(response.endpoint).toBe('rest/api/2/filter/10000/permission');
      expect(transport.lastCall()?.method).toBe('GET');
    });

    it('should reject a missing filter ID', async () => {
      const error = await captureError(service.gets(0), NoFilterIdError);

      expect(error.message).toBe('Filter ID is required');
      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('add', () => {
    it('should post only the fields that are set', async () => {
      transport.mockJson({ url: 'filter/10000/permission', method: 'POST' }, [sharePermissionFixtures.group()]);

      const { data } = await service.add(10000, { type: 'group', groupname: 'jira-administrators', projectId: '' });

      expect(transport.lastCall()?.body).toBe('{"type":"group","groupname":"jira-administrators"}');
      expect(data).toHaveLength(1);
      expect(data[0].group?.name).toBe('jira-administrators');
    });

    it('should log the added permission', async () => {
      transport.mockJson({ url: 'filter/10000/permission', method: 'POST' }, []);

      await service.add(10000, { type: 'project', projectId: '10002' });

      const entries = ctx.observability.logger.getEntries().filter((e) => e.message === 'Share permission added');
      expect(entries).toHaveLength(1);
      expect(entries[0].context).toEqual({ filterId: 10000, type: 'project' });
    });
  });

  describe('get', () => {
    it('should get one share permission', async () => {
      transport.mockJson('filter/10000/permission/10001', sharePermissionFixtures.project());

      const { data, response } = await service.get(10000, 10001);

      expect(data.type).toBe('project');
      expect(data.project?.key).toBe('TEST');
      expect(response.endpoint).toBe('rest/api/2/filter/10000/permission/10001');
    });

    it('should reject an invalid permission ID', async () => {
      const error = await captureError(service.get(10000, -1), ValidationError);

      expect(error.message).toBe('Validation failed: invalid share permission ID: -1');
      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('delete', () => {
    it('should delete a share permission', async () => {
      transport.mockStatus({ url: 'filter/10000/permission/10001', method: 'DELETE' }, 204);

      const response = await service.delete(10000, 10001);

      expect(response.status).toBe(204);
      expect(response.method).toBe('DELETE');
      expect(transport.lastCall()?.body).toBeUndefined();
    });
  });

  describe('tracing', () => {
    it('should wrap each operation in a named span', async () => {
      transport.mockJson('filter/defaultShareScope', { scope: 'GLOBAL' });

      await service.scope();

      const spans = ctx.observability.tracer.getSpansByName('jira.filterShare.scope');
      expect(spans).toHaveLength(1);
      expect(spans[0].attributes.operation).toBe('getDefaultShareScope');
    });
  });
});
