/**
 * Tests for the dashboard service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MockHttpTransport } from '../mocks/index.js';
import { DashboardService } from '../services/dashboard.js';
import { NoDashboardIdError, PermissionDeniedError, ValidationError } from '../errors/index.js';
import { TEST_SITE_URL, dashboardFixtures } from '../fixtures/index.js';
import { TestContext, captureError, createTestClient } from './helpers.js';

describe('DashboardService', () => {
  let ctx: TestContext;
  let transport: MockHttpTransport;
  let service: DashboardService;

  beforeEach(() => {
    ctx = createTestClient();
    transport = ctx.transport;
    service = ctx.client.dashboard;
  });

  describe('gets', () => {
    it('should list dashboards with offset parameters', async () => {
      transport.mockJson('rest/api/3/dashboard', dashboardFixtures.page([dashboardFixtures.dashboard()]));

      const { data, response } = await service.gets(0, 50);

      expect(response.endpoint).toBe('rest/api/3/dashboard?startAt=0&maxResults=50');
      expect(data.dashboards.map((d) => [d.id, d.name])).toEqual([['10100', 'Team board']]);
    });

    it('should pass a valid filter', async () => {
      transport.mockJson('rest/api/3/dashboard', dashboardFixtures.page([]));

      const { response } = await service.gets(0, 50, 'favourite');

      expect(response.endpoint).toBe('rest/api/3/dashboard?startAt=0&maxResults=50&filter=favourite');
    });

    it('should reject an unknown filter without sending', async () => {
      const error = await captureError(service.gets(0, 50, 'shared'), ValidationError);

      expect(error.message).toBe('Validation failed: filter must be one of: favourite, my');
      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('search', () => {
    it('should send the set search keys after the offsets', async () => {
      transport.mockJson('dashboard/search', {
        startAt: 0,
        maxResults: 20,
        total: 1,
        isLast: true,
        values: [dashboardFixtures.dashboard()],
      });

      const { data, response } = await service.search(
        {
          dashboardName: 'Team',
          accountId: 'acc-1',
          projectId: 10002,
          orderBy: 'name',
          status: 'active',
          expand: ['description', 'owner'],
        },
        0,
        20
      );

      expect(response.endpoint).toBe(
        'rest/api/3/dashboard/search?startAt=0&maxResults=20&dashboardName=Team&accountId=acc-1' +
          '&projectId=10002&orderBy=name&status=active&expand=description%2Cowner'
      );
      expect(data.values).toHaveLength(1);
    });
  });

  describe('get', () => {
    it('should get a dashboard', async () => {
      transport.mockJson('dashboard/10100', dashboardFixtures.dashboard());

      const { data, response } = await service.get('10100');

      expect(data.name).toBe('Team board');
      expect(response.endpoint).toBe('rest/api/3/dashboard/10100');
    });

    it('should reject an empty dashboard ID', async () => {
      const error = await captureError(service.get(''), NoDashboardIdError);

      expect(error.message).toBe('Dashboard ID is required');
      expect(transport.getCalls()).toHaveLength(0);
    });

    it('should carry the envelope on a 403', async () => {
      transport.mockJson('dashboard/10100', { errorMessages: ['You do not have permission to view this dashboard.'] }, 403);

      const error = await captureError(service.get('10100'), PermissionDeniedError);

      expect(error.message).toBe('You do not have permission to view this dashboard.');
      expect(error.response?.status).toBe(403);
    });
  });

  describe('create', () => {
    it('should post the payload', async () => {
      transport.mockJson({ url: 'rest/api/3/dashboard', method: 'POST' }, dashboardFixtures.dashboard());

      const { data } = await service.create({ name: 'Team board', sharePermissions: [{ type: 'global' }] });

      expect(data.id).toBe('10100');
      expect(transport.lastCall()?.url).toBe(`${TEST_SITE_URL}/rest/api/3/dashboard`);
      expect(transport.lastCall()?.body).toBe('{"name":"Team board","sharePermissions":[{"type":"global"}]}');
    });

    it('should require a name', async () => {
      const error = await captureError(service.create({ name: ' ', sharePermissions: [] }), ValidationError);

      expect(error.message).toBe('Validation failed: dashboard name is required');
      expect(transport.getCalls()).toHaveLength(0);
    });
  });

  describe('update', () => {
    it('should put the payload', async () => {
      transport.mockJson({ url: 'dashboard/10100', method: 'PUT' }, dashboardFixtures.dashboard({ name: 'Renamed' }));

      const { data } = await service.update('10100', { name: 'Renamed', sharePermissions: [] });

      expect(data.name).toBe('Renamed');
      expect(transport.lastCall()?.method).toBe('PUT');
    });
  });

  describe('delete', () => {
    it('should delete a dashboard', async () => {
      transport.mockStatus({ url: 'dashboard/10100', method: 'DELETE' }, 204);

      const response = await service.delete('10100');

      expect(response.status).toBe(204);
      expect(response.endpoint).toBe('rest/api/3/dashboard/10100');
    });
  });

  describe('copy', () => {
    it('should copy a dashboard and log both IDs', async () => {
      transport.mockJson({ url: 'dashboard/10100/copy', method: 'POST' }, dashboardFixtures.dashboard({ id: '10200', name: 'Copy' }));

      const { data, response } = await service.copy('10100', { name: 'Copy', sharePermissions: [] });

      expect(data.id).toBe('10200');
      expect(response.endpoint).toBe('rest/api/3/dashboard/10100/copy');

      const [entry] = ctx.observability.logger.getEntries().filter((e) => e.message === 'Dashboard copied');
      expect(entry.context).toEqual({ sourceId: '10100', dashboardId: '10200' });
    });
  });
});
