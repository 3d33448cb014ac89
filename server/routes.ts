import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { api } from "@shared/routes";
import type { LocationInput, Reply } from "@shared/conversation";
import { statusCodeFor, toAppError } from "./error-handling";
import { monitoring } from "./monitoring";
import type { TrackingEngine } from "./tracking-engine";

/**
 * JSON-safe copy of a reply: bytes become base64, dates ISO strings.
 */
export function toWire(value: unknown): unknown {
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toWire);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = toWire(entry);
    }
    return out;
  }
  return value;
}

export function replyStatus(reply: Reply): number {
  return reply.kind === 'error' ? statusCodeFor(reply.code) : 200;
}

export function toLocationInput(body: z.infer<typeof api.conversations.location.input>): LocationInput {
  if ('latitude' in body) {
    return { kind: 'coordinates', latitude: body.latitude, longitude: body.longitude };
  }
  if ('postalCode' in body) {
    return { kind: 'postal_code', postalCode: body.postalCode };
  }
  return { kind: 'skip' };
}

function sendReply(res: Response, reply: Reply) {
  return res.status(replyStatus(reply)).json(toWire(reply));
}

function sendValidationError(res: Response, error: z.ZodError) {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  return res.status(400).json({ message: issue?.message ?? 'Invalid request', field });
}

function sendFailure(res: Response, err: unknown, context: string) {
  const appError = toAppError(err);
  console.error(`${context} error:`, appError.originalError?.message ?? appError.message);
  return res.status(appError.getStatusCode()).json(appError.toJSON());
}

export function registerRoutes(httpServer: Server, app: Express, engine: TrackingEngine): Server {
  // ============ CONVERSATION ============

  app.post(api.conversations.photo.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);
    const parseResult = api.conversations.photo.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    const bytes = new Uint8Array(Buffer.from(parseResult.data.imageBase64, 'base64'));
    if (bytes.length === 0) {
      return res.status(400).json({ message: 'Image is empty', field: 'imageBase64' });
    }

    try {
      const reply = await engine.handlePhoto(userId.data, { ref: parseResult.data.photoRef, bytes });
      sendReply(res, reply);
    } catch (err) {
      sendFailure(res, err, 'Photo');
    }
  });

  app.post(api.conversations.text.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);
    const parseResult = api.conversations.text.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    try {
      sendReply(res, await engine.handleText(userId.data, parseResult.data.text));
    } catch (err) {
      sendFailure(res, err, 'Text');
    }
  });

  app.post(api.conversations.location.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);
    const parseResult = api.conversations.location.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    try {
      sendReply(res, await engine.handleLocation(userId.data, toLocationInput(parseResult.data)));
    } catch (err) {
      sendFailure(res, err, 'Location');
    }
  });

  app.post(api.conversations.cancel.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);

    try {
      sendReply(res, await engine.handleCancel(userId.data));
    } catch (err) {
      sendFailure(res, err, 'Cancel');
    }
  });

  app.get(api.conversations.snapshot.path, (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);
    res.json(engine.getSessionSnapshot(userId.data));
  });

  // ============ SEARCH ============

  app.post(api.search.text.path, async (req, res) => {
    const parseResult = api.search.text.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    try {
      sendReply(res, await engine.handleTextSearch(parseResult.data.userId, parseResult.data.query));
    } catch (err) {
      sendFailure(res, err, 'Search');
    }
  });

  // ============ USERS ============

  app.get(api.users.items.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);

    try {
      sendReply(res, await engine.listUserItems(userId.data));
    } catch (err) {
      sendFailure(res, err, 'List user items');
    }
  });

  app.put(api.users.preferences.path, async (req, res) => {
    const userId = api.params.userId.safeParse(req.params.userId);
    if (!userId.success) return sendValidationError(res, userId.error);
    const parseResult = api.users.preferences.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    try {
      sendReply(res, await engine.setLanguage(userId.data, parseResult.data.language));
    } catch (err) {
      sendFailure(res, err, 'Preferences');
    }
  });

  // ============ ITEMS ============

  app.get(api.items.list.path, async (_req, res) => {
    try {
      res.json(toWire(await engine.listItemLocations()));
    } catch (err) {
      sendFailure(res, err, 'Item overview');
    }
  });

  app.get(api.items.get.path, async (req, res) => {
    const itemId = api.params.itemId.safeParse(req.params.id);
    if (!itemId.success) return sendValidationError(res, itemId.error);

    try {
      sendReply(res, await engine.describeItem(itemId.data));
    } catch (err) {
      sendFailure(res, err, 'Item');
    }
  });

  app.get(api.items.route.path, async (req, res) => {
    const itemId = api.params.itemId.safeParse(req.params.id);
    if (!itemId.success) return sendValidationError(res, itemId.error);

    try {
      res.json(toWire(await engine.getRoute(itemId.data)));
    } catch (err) {
      sendFailure(res, err, 'Route');
    }
  });

  app.delete(api.items.delete.path, async (req, res) => {
    const itemId = api.params.itemId.safeParse(req.params.id);
    if (!itemId.success) return sendValidationError(res, itemId.error);
    const parseResult = api.items.delete.input.safeParse(req.body);
    if (!parseResult.success) return sendValidationError(res, parseResult.error);

    try {
      sendReply(res, await engine.deleteItem(parseResult.data.userId, itemId.data));
    } catch (err) {
      sendFailure(res, err, 'Delete item');
    }
  });

  // ============ HEALTH ============

  app.get(api.health.path, (_req, res) => {
    const collaborators = monitoring.getHealthStatus();
    const status = collaborators.some((entry) => entry.status === 'down') ? 'degraded' : 'ok';
    res.json({ status, collaborators });
  });

  return httpServer;
}
