import { randomUUID } from 'node:crypto'
import express, { type ErrorRequestHandler, type Router } from 'express'
import { AuthErrorMessages } from '@passcode-auth/shared-types'
import { logger as defaultLogger, type Logger } from '../logger'
import { createAuthHandlers, type AuthHandler, type AuthHandlerDeps, type HttpReply } from './authHandlers'

export interface AuthRouterDeps extends AuthHandlerDeps {
  logger?: Logger
}

const isBodyParseError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'

/**
 * Reply for errors that escaped a handler. Unparseable JSON is a client error;
 * anything else is logged under a request id that the client gets back.
 */
export const unexpectedErrorReply = (err: unknown, log: Logger): HttpReply => {
  if (isBodyParseError(err)) {
    return { status: 400, body: { error: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' } }
  }

  const requestId = randomUUID()
  log.error(`Unhandled error (request ${requestId})`, err)
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: AuthErrorMessages.INTERNAL_ERROR, requestId } }
}

const send = (res: express.Response, reply: HttpReply): void => {
  if (reply.headers) res.set(reply.headers)
  res.status(reply.status).json(reply.body)
}

export const createAuthRouter = (deps: AuthRouterDeps): Router => {
  const log = (deps.logger ?? defaultLogger).child('http')
  const handlers = createAuthHandlers(deps)
  const router = express.Router()

  const route =
    (handler: AuthHandler): express.RequestHandler =>
    (req, res, next) => {
      void handler(req.body)
        .then((reply) => send(res, reply))
        .catch(next)
    }

  router.use(express.json({ limit: '16kb' }))

  router.post('/auth/otp/request', route(handlers.requestOtp))
  router.post('/auth/otp/verify', route(handlers.verifyOtp))
  router.post('/auth/register', route(handlers.register))
  router.post('/auth/register/verify', route(handlers.verifyRegistration))
  router.post('/auth/login', route(handlers.login))
  router.post('/auth/login/verify', route(handlers.verifyLogin))

  const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
    send(res, unexpectedErrorReply(err, log))
  }
  router.use(handleError)

  return router
}
