import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerProjectTool } from './tools/project.js';
import { registerWorkspaceTool } from './tools/workspace.js';
import { registerCaveTool } from './tools/cave.js';
import { registerObjectTool } from './tools/object.js';

export const SERVER_INFO = {
  name: 'cave-mcp-server',
  version: '1.0.0',
};

/**
 * Builds the server with every tool registered.
 */
export function createServer(): McpServer {
  const server = new McpServer(SERVER_INFO);
  registerProjectTool(server);
  registerWorkspaceTool(server);
  registerCaveTool(server);
  registerObjectTool(server);
  return server;
}
