import { ToolSpec } from '../types';

/**
 * Builds the system prompt for the agent
 */
export class SystemPromptBuilder {
  constructor(private readonly workspace: string) {}

  build(tools: readonly ToolSpec[]): string {
    const sections: string[] = [];

    sections.push(
      `You are an expert Linux CLI agent working inside the directory: ${this.workspace}. ` +
        'You can run shell commands, write code, and read files. Every path you pass to a ' +
        'tool is relative to that directory, and you cannot reach files outside it.'
    );

    if (tools.length > 0) {
      sections.push('\n\nTOOLS:');
      for (const tool of tools) {
        const note = tool.requiresApproval ? ' (the user must approve each call)' : '';
        sections.push(`- ${tool.name}: ${tool.description}${note}`);
      }
    }

    sections.push(
      '\n\nGUIDELINES:\n' +
        '1. When asked to write code, first write the file, then try to run it to verify it works.\n' +
        '2. If a command fails, read the error, fix the code or command, and try again.\n' +
        '3. If the user denies a command, do not retry it unchanged; explain or choose another approach.\n' +
        '4. Be concise.'
    );

    return sections.join('\n');
  }
}
