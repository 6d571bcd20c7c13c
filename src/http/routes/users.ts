import { Router, Request, Response, NextFunction } from 'express';
import { BadRequestError, NotFoundError, ValidationError } from '../../store/errors.js';
import type { UserStore } from '../../store/user-store.js';
import { methodNotAllowed } from '../middleware.js';
import { createUserBodySchema } from '../../types/schemas.js';

const ID_PATTERN = /^[1-9][0-9]*$/;

/**
 * Parse the `:id` segment. Anything that is not a positive decimal integer
 * cannot name a user, so it answers like an unknown id.
 */
export function parseUserId(raw: string): number {
  const id = Number(raw);
  if (!ID_PATTERN.test(raw) || !Number.isSafeInteger(id)) {
    throw new NotFoundError();
  }
  return id;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function usersRouter(store: UserStore): Router {
  const router = Router({ caseSensitive: true });

  router
    .route('/')
    .get((_req: Request, res: Response) => {
      res.json(store.list());
    })
    .post((req: Request, res: Response) => {
      // express.json() leaves {} when there is no JSON body
      const body: unknown = req.body ?? {};
      if (!isPlainObject(body)) {
        throw new BadRequestError();
      }
      const parsed = createUserBodySchema.safeParse(body);
      if (!parsed.success) {
        throw new ValidationError();
      }
      const user = store.create(parsed.data.name, parsed.data.email);
      res.status(201).json(user);
    })
    .all(methodNotAllowed('GET', 'POST'));

  const rejectMethod = methodNotAllowed('GET', 'DELETE');
  router
    .route('/:id')
    .get((req: Request, res: Response) => {
      res.json(store.get(parseUserId(req.params.id)));
    })
    .delete((req: Request, res: Response) => {
      const id = parseUserId(req.params.id);
      store.delete(id);
      res.json({ deleted: id });
    })
    .all((req: Request, res: Response, next: NextFunction) => {
      // a segment that is not an id is an unknown path, whatever the method
      parseUserId(req.params.id);
      rejectMethod(req, res, next);
    });

  return router;
}
