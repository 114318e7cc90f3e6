import { callAgent, type AgentAdapter, type AgentMethod } from "./base";

export interface ChatAgent {
  chat(text: string): unknown;
}

export class ChatAdapter implements AgentAdapter {
  readonly type = "chat" as const;
  readonly agent: unknown;
  private readonly chat: AgentMethod;

  constructor(agent: unknown, chat: AgentMethod) {
    this.agent = agent;
    this.chat = chat;
  }

  invoke(text: string): Promise<string> {
    return callAgent(this.type, () => this.chat(text));
  }
}
