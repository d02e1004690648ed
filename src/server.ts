import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import cookie from '@fastify/cookie';
import formbody from '@fastify/formbody';
import { z } from 'zod';
import { AppError, DataCorruptionError } from './errors';
import { createComponentLogger } from './logger';
import { toPrincipal } from './models';
import { readAsset, renderPage, type PageName } from './pages';
import { AuthService } from './services/authService';
import { NoteService } from './services/noteService';
import { ReminderService } from './services/reminderService';
import { createStore, type DataStore, type StoreKind } from './store';
import { isValidTimeZone, toPage } from './utils';

export const SESSION_COOKIE = 'nw_session';
const DEV_SESSION_SECRET = 'development-session-secret-not-for-production';
const PAGE_FAILURE_MESSAGE = 'Something went wrong on our side. Please try again later.';

export interface BuildServerOptions {
  storage?: StoreKind;
  databaseUrl?: string;
  sessionSecret?: string;
  secureCookies?: boolean;
  /** Seconds between reminder dispatch runs; 0 disables the poller. */
  reminderPollSec?: number;
  /** Replaces the store built from `storage` and `databaseUrl`. */
  store?: DataStore;
}

const log = createComponentLogger('http');

const idParamsSchema = z.object({ id: z.coerce.number().int().positive() });

const pageQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional()
});

const reminderDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const registerFormSchema = z
  .object({
    email: z.string().trim().email('Enter a valid email address'),
    username: z
      .string()
      .trim()
      .min(3, 'Username must be 3-32 characters')
      .max(32, 'Username must be 3-32 characters')
      .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, ".", "_" and "-"'),
    password: z.string().min(1, 'Password is required'),
    password_confirm: z.string()
  })
  .refine((form) => form.password === form.password_confirm, {
    message: 'Passwords do not match',
    path: ['password_confirm']
  });

const loginFormSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required')
});

function sessionUserId(request: FastifyRequest): string | undefined {
  const raw = request.cookies[SESSION_COOKIE];
  if (!raw) {
    return undefined;
  }
  const result = request.unsignCookie(raw);
  return result.valid && result.value !== null ? result.value : undefined;
}

function sendPage(reply: FastifyReply, name: PageName, status = 200, message?: string) {
  return reply.status(status).type('text/html; charset=utf-8').send(renderPage(name, message));
}

/** Form posts answer with the page, never the JSON envelope. */
function sendPageError(reply: FastifyReply, name: PageName, err: unknown) {
  if (!(err instanceof AppError)) {
    throw err;
  }
  if (err.status >= 500) {
    return sendPage(reply, name, err.status, PAGE_FAILURE_MESSAGE);
  }
  return sendPage(reply, name, err.status, err.message);
}

export function buildServer(options: BuildServerOptions = {}) {
  const storage =
    options.storage ?? (process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'postgres');
  const databaseUrl = options.databaseUrl ?? process.env.DATABASE_URL;
  const sessionSecret = options.sessionSecret ?? process.env.SESSION_SECRET ?? DEV_SESSION_SECRET;
  const secureCookies = options.secureCookies ?? process.env.NODE_ENV === 'production';
  const reminderPollSec =
    options.reminderPollSec ?? Number(process.env.REMINDER_POLL_INTERVAL_SEC ?? 60);
  const startedAt = Date.now();

  const app = Fastify({ logger: false });
  const store = options.store ?? createStore({ kind: storage, databaseUrl });
  const authService = new AuthService(store);
  const noteService = new NoteService(store);
  const reminderService = new ReminderService(store);
  let stopReminders = () => {};

  if (sessionSecret === DEV_SESSION_SECRET) {
    log.warn('SESSION_SECRET is not set; using the development secret');
  }

  app.register(cookie, { secret: sessionSecret });
  app.register(formbody);

  app.addHook('onReady', async () => {
    await store.init();
    if (reminderPollSec > 0) {
      stopReminders = reminderService.start(reminderPollSec * 1000);
    }
  });

  app.addHook('onClose', async () => {
    stopReminders();
    await store.close();
  });

  const requireUser = async (request: FastifyRequest) =>
    authService.requireUser(sessionUserId(request));

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      // corrupt data is logged where it is detected
      if (error.status >= 500 && !(error instanceof DataCorruptionError)) {
        log.error({ err: error, url: request.url }, 'request failed');
      }
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'Invalid request parameters',
        details: { issues: error.issues }
      });
      return;
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        code: error.statusCode * 100,
        message: error.message
      });
      return;
    }

    log.error({ err: error, url: request.url }, 'unhandled request error');
    reply.status(500).send({
      code: 50000,
      message: 'Internal server error'
    });
  });

  app.get('/healthz', async () => ({
    code: 0,
    message: 'ok',
    data: { status: 'ok', uptime_sec: Math.round((Date.now() - startedAt) / 1000) }
  }));

  app.get('/readyz', async (_request, reply) => {
    try {
      await store.ping();
    } catch (err) {
      log.warn({ err }, 'store ping failed');
      return reply.status(503).send({ code: 50301, message: 'Store unavailable' });
    }
    return { code: 0, message: 'ok', data: { status: 'ready' } };
  });

  app.get('/app.css', async (_request, reply) =>
    reply.type('text/css; charset=utf-8').send(readAsset('app.css'))
  );

  app.get('/logo.svg', async (_request, reply) =>
    reply.type('image/svg+xml').send(readAsset('logo.svg'))
  );

  app.get('/', async (_request, reply) => sendPage(reply, 'index'));

  app.get('/about', async (_request, reply) => sendPage(reply, 'about'));

  app.get('/register', async (_request, reply) => sendPage(reply, 'register'));

  app.post('/register', async (request, reply) => {
    const parsed = registerFormSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendPage(reply, 'register', 400, parsed.error.issues[0]?.message);
    }
    try {
      await authService.register({
        username: parsed.data.username,
        email: parsed.data.email,
        password: parsed.data.password
      });
    } catch (err) {
      return sendPageError(reply, 'register', err);
    }
    return reply.redirect('/login', 303);
  });

  app.get('/login', async (_request, reply) => sendPage(reply, 'login'));

  app.post('/login', async (request, reply) => {
    const parsed = loginFormSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendPage(reply, 'login', 400, parsed.error.issues[0]?.message);
    }
    let principalId: string;
    try {
      const user = await authService.login(parsed.data);
      principalId = toPrincipal(user).getId();
    } catch (err) {
      return sendPageError(reply, 'login', err);
    }
    reply.setCookie(SESSION_COOKIE, principalId, {
      signed: true,
      httpOnly: true,
      sameSite: 'lax',
      secure: secureCookies,
      path: '/'
    });
    return reply.redirect('/', 303);
  });

  app.post('/logout', async (_request, reply) => {
    reply.clearCookie(SESSION_COOKIE, { path: '/' });
    return reply.redirect('/', 303);
  });

  app.get('/v1/me', async (request) => {
    const user = await requireUser(request);
    return {
      code: 0,
      message: 'ok',
      data: {
        id: user.id,
        username: user.username,
        email: user.email,
        creation_date: user.creationDate,
        country: user.country,
        time_zone: user.timeZone
      }
    };
  });

  app.patch('/v1/me', async (request) => {
    const user = await requireUser(request);
    const body = z
      .object({
        email: z.string().email().optional(),
        country: z.string().trim().min(1).max(64).optional(),
        time_zone: z
          .string()
          .refine(isValidTimeZone, { message: 'Unknown time zone' })
          .optional()
      })
      .parse(request.body);
    const updated = await authService.updateProfile(user.id, {
      email: body.email,
      country: body.country,
      timeZone: body.time_zone
    });
    return {
      code: 0,
      message: 'ok',
      data: {
        id: updated.id,
        username: updated.username,
        email: updated.email,
        country: updated.country,
        time_zone: updated.timeZone
      }
    };
  });

  app.post('/v1/me/password', async (request) => {
    const user = await requireUser(request);
    const body = z
      .object({ old_password: z.string().min(1), new_password: z.string().min(1) })
      .parse(request.body);
    await authService.changePassword(user.id, {
      oldPassword: body.old_password,
      newPassword: body.new_password
    });
    return { code: 0, message: 'ok' };
  });

  app.delete('/v1/me', async (request, reply) => {
    const user = await requireUser(request);
    const body = z.object({ password: z.string().min(1) }).parse(request.body);
    await authService.deleteAccount(user.id, body.password);
    reply.clearCookie(SESSION_COOKIE, { path: '/' });
    return { code: 0, message: 'ok' };
  });

  app.get('/v1/notes', async (request) => {
    const user = await requireUser(request);
    const query = pageQuerySchema.parse(request.query);
    const notes = await noteService.list(user.id, toPage(query));
    return { code: 0, message: 'ok', data: notes };
  });

  app.post('/v1/notes', async (request) => {
    const user = await requireUser(request);
    const body = z
      .object({
        title: z.string().trim().min(1).max(200),
        body: z.string().min(1),
        tags: z.array(z.string()).max(20).optional(),
        reminder_date: reminderDateSchema.nullable().optional()
      })
      .parse(request.body);
    const result = await noteService.create(user.id, {
      title: body.title,
      body: body.body,
      tags: body.tags,
      reminderDate: body.reminder_date
    });
    return { code: 0, message: 'ok', data: result };
  });

  app.get('/v1/notes/:id', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    const result = await noteService.getById(user.id, params.id);
    return { code: 0, message: 'ok', data: result };
  });

  app.patch('/v1/notes/:id', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    const body = z
      .object({
        title: z.string().trim().min(1).max(200).optional(),
        body: z.string().min(1).optional()
      })
      .refine((edit) => edit.title !== undefined || edit.body !== undefined, {
        message: 'Nothing to update'
      })
      .parse(request.body);
    const note = await noteService.edit(user.id, params.id, body);
    return { code: 0, message: 'ok', data: note };
  });

  app.delete('/v1/notes/:id', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    await noteService.delete(user.id, params.id);
    return { code: 0, message: 'ok' };
  });

  app.put('/v1/notes/:id/reminder', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    const body = z.object({ reminder_date: reminderDateSchema.nullable() }).parse(request.body);
    const note = await noteService.setReminder(user.id, params.id, body.reminder_date);
    return { code: 0, message: 'ok', data: note };
  });

  app.post('/v1/notes/:id/tags', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    const body = z.object({ tag: z.string() }).parse(request.body);
    const result = await noteService.attachTag(user.id, params.id, body.tag);
    return { code: 0, message: 'ok', data: result };
  });

  app.delete('/v1/notes/:id/tags/:tagId', async (request) => {
    const user = await requireUser(request);
    const params = z
      .object({
        id: z.coerce.number().int().positive(),
        tagId: z.coerce.number().int().positive()
      })
      .parse(request.params);
    const result = await noteService.detachTag(user.id, params.id, params.tagId);
    return { code: 0, message: 'ok', data: result };
  });

  app.get('/v1/tags/:id/notes', async (request) => {
    const user = await requireUser(request);
    const params = idParamsSchema.parse(request.params);
    const query = pageQuerySchema.parse(request.query);
    const result = await noteService.notesForTag(user.id, params.id, toPage(query));
    return { code: 0, message: 'ok', data: result };
  });

  return app;
}
