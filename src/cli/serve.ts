import { Command, InvalidArgumentError } from 'commander'
import { HttpPlugin } from '../plugins/http.js'
import { createContext } from './context.js'

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer from 1 to 65535')
  }
  return port
}

export const serveCommand = new Command('serve')
  .description('Serve the brain over HTTP')
  .option('-p, --port <port>', 'port to listen on (overrides http.json)', parsePort)
  .action(async (opts: { port?: number }, cmd: Command) => {
    const ctx = await createContext(cmd)
    if (opts.port !== undefined) ctx.config.http.port = opts.port

    const plugin = new HttpPlugin()
    await plugin.start(ctx)

    const shutdown = async () => {
      await plugin.stop()
      process.exit(0)
    }
    process.once('SIGINT', () => { void shutdown() })
    process.once('SIGTERM', () => { void shutdown() })
  })
