/**
 * @package stackweave server
 *
 * PUBLIC API for the HTTP + WebSocket service.
 *
 * TYPES:
 *   - StackView, SpawnView      - JSON views of stacks and spawns
 *   - CommandResponse           - Result of POST /command
 *   - ServerEvent               - WebSocket events (server -> client)
 *   - ClientCommand             - WebSocket commands (client -> server)
 *
 * IMPLEMENTATION:
 *   - StackServer               - The HTTP/WebSocket server
 *   - BroadcastSink             - Output sink feeding WebSocket clients
 *   - startStackServer()        - Quick start function
 */

export type {
  StackView,
  SpawnView,
  CommandResponse,
  ErrorResponse,
  ServerEvent,
  ClientCommand,
} from './stackService';

export { StackServer, BroadcastSink, type StackServerOptions } from './stackServer';

import { StackServer, type StackServerOptions } from './stackServer';

/**
 * Start a server and wait until it is listening.
 *
 * @example
 * ```typescript
 * const server = await startStackServer({ port: 7420 });
 * // REST at http://127.0.0.1:7420, WebSocket at ws://127.0.0.1:7420/ws
 * ```
 */
export async function startStackServer(options: StackServerOptions = {}): Promise<StackServer> {
  const server = await StackServer.create(options);
  try {
    await server.start();
  } catch (e) {
    await server.stop();
    throw e;
  }
  return server;
}

/**
 * # REST Endpoints
 *
 * - GET    /health                 - Liveness and counts
 * - GET    /stacks                 - List stacks
 * - POST   /stacks                 - Create (body: { name, type, perspective?, capacity?, replace? })
 * - GET    /stacks/:name           - Stack with items and rendering
 * - DELETE /stacks/:name           - Remove stack
 * - POST   /command                - Run a line (body: { line })
 * - GET    /spawns                 - List spawns
 * - POST   /spawns                 - Create (body: { name, stackType?, mailbox? })
 * - POST   /spawns/:name/script    - Deposit (body: { script })
 * - POST   /spawns/:name/pause     - Pause
 * - POST   /spawns/:name/resume    - Resume
 * - POST   /spawns/:name/stop      - Stop
 * - DELETE /spawns/:name           - Stop, join and remove
 * - GET    /memory/:addr           - Read one cell
 *
 * # WebSocket (/ws)
 *
 * Server events:
 * - { type: 'hello', stacks, spawns }
 * - { type: 'output', event: { kind, source, line?, lines, ok } }
 * - { type: 'result', response: CommandResponse }
 * - { type: 'error', error }
 *
 * Client commands:
 * - { type: 'command', line }
 * - { type: 'deposit', spawn, script }
 * - { type: 'list' }
 */
