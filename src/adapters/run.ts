import { callAgent, type AgentAdapter, type AgentMethod } from "./base";

export interface RunAgent {
  run(text: string): unknown;
}

export class RunAdapter implements AgentAdapter {
  readonly type = "run" as const;
  readonly agent: unknown;
  private readonly run: AgentMethod;

  constructor(agent: unknown, run: AgentMethod) {
    this.agent = agent;
    this.run = run;
  }

  invoke(text: string): Promise<string> {
    return callAgent(this.type, () => this.run(text));
  }
}
