import type { Server } from 'node:http'

import { createServer } from 'node:http'

import type { DashboardApi, DashboardResponse } from './api'

import { createLogger } from '../utils/logger'

const logger = createLogger('DashboardServer')

/**
 * Serves the dashboard API over HTTP on the given port
 */
export function startDashboardServer(api: DashboardApi, port: number): Promise<Server> {
  const server = createServer((req, res) => {
    const method = req.method ?? 'GET'
    const url = req.url ?? '/'

    const send = (response: DashboardResponse) => {
      res.writeHead(response.status, { 'Content-Type': response.contentType })
      res.end(response.body)
      logger.debug(`${method} ${url} -> ${response.status}`)
    }

    api.handle(method, url)
      .then(send)
      .catch((error: unknown) => {
        logger.error(`Unhandled error for ${method} ${url}:`, error)
        send({ body: '{"error":"Internal server error"}', contentType: 'application/json; charset=utf-8', status: 500 })
      })
  })

  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, () => {
      server.off('error', reject)
      logger.info(`Dashboard listening on port ${port}`)
      resolve(server)
    })
  })
}

export function stopDashboardServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error)

        return
      }
      resolve()
    })
  })
}
