import { TOOLS_CALL_METHOD, TOOLS_LIST_METHOD } from '../protocol/json-rpc.js';
import type { SessionBroker } from '../relay/session-broker.js';

export const DEFAULT_CLIENT_NAME = 'default-client';

/** Agent-facing wrappers over the desktop file MCP server's tools. Each returns the JSON-RPC reply as text. */
export class LocalFileSystemTools {
  constructor(private readonly broker: Pick<SessionBroker, 'sendMcpRequest'>) {}

  listLocalFiles(folderPath: string, clientName = DEFAULT_CLIENT_NAME, signal?: AbortSignal): Promise<string> {
    return this.callTool(clientName, 'search_files', { startingDir: folderPath, searchPatterns: '*' }, signal);
  }

  readLocalFile(filePath: string, clientName = DEFAULT_CLIENT_NAME, signal?: AbortSignal): Promise<string> {
    return this.callTool(clientName, 'read_text_file', { filePath }, signal);
  }

  searchLocalFiles(startingDir: string, searchPatterns: string, clientName = DEFAULT_CLIENT_NAME, signal?: AbortSignal): Promise<string> {
    return this.callTool(clientName, 'search_files', { startingDir, searchPatterns }, signal);
  }

  getLocalFileDetails(filePath: string, clientName = DEFAULT_CLIENT_NAME, signal?: AbortSignal): Promise<string> {
    return this.callTool(clientName, 'get_file_details', { path: filePath }, signal);
  }

  async listTools(clientName = DEFAULT_CLIENT_NAME, signal?: AbortSignal): Promise<string> {
    const { reply } = await this.broker.sendMcpRequest(clientName, TOOLS_LIST_METHOD, {}, signal);
    return JSON.stringify(reply);
  }

  private async callTool(clientName: string, name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const { reply } = await this.broker.sendMcpRequest(clientName, TOOLS_CALL_METHOD, { name, arguments: args }, signal);
    return JSON.stringify(reply);
  }
}
