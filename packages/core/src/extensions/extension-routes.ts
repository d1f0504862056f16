/**
 * Extension Routes: REST API for the extension lifecycle, plus the
 * wildcard route that forwards admin requests into the extension route
 * table.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ExtensionSettingsUpdateSchema } from '@plugstead/shared';
import { sendError, statusForError, toErrorMessage } from '../utils/errors.js';
import type { ExtensionManager } from './manager.js';
import type { ExtensionRouteTable } from './routing.js';

type IdRequest = FastifyRequest<{ Params: { id: string } }>;

export function registerExtensionRoutes(
  app: FastifyInstance,
  deps: { extensionManager: ExtensionManager; routeTable?: ExtensionRouteTable }
): void {
  const { extensionManager, routeTable } = deps;

  const fail = (reply: FastifyReply, err: unknown) =>
    sendError(reply, statusForError(err), toErrorMessage(err));

  const settingsFor = (id: string) => {
    // Throws for unknown ids
    extensionManager.getInstalledExtension(id);
    return extensionManager.getEnabledExtension(id)?.settings;
  };

  // ── Lifecycle ────────────────────────────────────────────────

  app.get('/api/v1/extensions', async () => {
    const extensions = extensionManager.getInstalledExtensions().map((d) => d.toInfo());
    return { extensions };
  });

  app.post('/api/v1/extensions/discover', async (_request, reply) => {
    try {
      const extensions = (await extensionManager.discover()).map((d) => d.toInfo());
      return { extensions, count: extensions.length };
    } catch (err) {
      return fail(reply, err);
    }
  });

  app.get('/api/v1/extensions/:id', async (request: IdRequest, reply: FastifyReply) => {
    try {
      return { extension: extensionManager.getInstalledExtension(request.params.id).toInfo() };
    } catch (err) {
      return fail(reply, err);
    }
  });

  app.post('/api/v1/extensions/:id/enable', async (request: IdRequest, reply: FastifyReply) => {
    try {
      const instance = await extensionManager.enable(request.params.id);
      return { extension: instance.descriptor.toInfo() };
    } catch (err) {
      return fail(reply, err);
    }
  });

  app.post('/api/v1/extensions/:id/disable', async (request: IdRequest, reply: FastifyReply) => {
    try {
      const descriptor = extensionManager.getInstalledExtension(request.params.id);
      await extensionManager.disable(descriptor.id);
      return { extension: descriptor.toInfo() };
    } catch (err) {
      return fail(reply, err);
    }
  });

  // ── Settings ─────────────────────────────────────────────────

  app.get('/api/v1/extensions/:id/settings', async (request: IdRequest, reply: FastifyReply) => {
    try {
      const settings = settingsFor(request.params.id);
      if (!settings) {
        return sendError(reply, 409, `Extension ${request.params.id} is not enabled`);
      }
      return { settings: settings.toJSON() };
    } catch (err) {
      return fail(reply, err);
    }
  });

  app.put(
    '/api/v1/extensions/:id/settings',
    async (request: FastifyRequest<{ Params: { id: string }; Body: unknown }>, reply: FastifyReply) => {
      const body = ExtensionSettingsUpdateSchema.safeParse(request.body);
      if (!body.success) {
        return sendError(reply, 400, 'Settings must be a JSON object');
      }

      try {
        const settings = settingsFor(request.params.id);
        if (!settings) {
          return sendError(reply, 409, `Extension ${request.params.id} is not enabled`);
        }
        settings.update(body.data);
        await settings.save();
        return { settings: settings.toJSON() };
      } catch (err) {
        return fail(reply, err);
      }
    }
  );

  // ── Extension admin routes ───────────────────────────────────

  if (routeTable) {
    app.all(`${extensionManager.getAdminPrefix()}*`, async (request, reply) => routeTable.dispatch(request, reply));
  }
}
