import { callAgent, type AgentAdapter, type AgentMethod } from "./base";

export type AgentFunction = (text: string) => unknown;

export interface CallableAgent {
  call(text: string): unknown;
}

export class FunctionAdapter implements AgentAdapter {
  readonly type = "function" as const;
  readonly agent: unknown;
  private readonly fn: AgentMethod;

  constructor(agent: unknown, fn: AgentMethod) {
    this.agent = agent;
    this.fn = fn;
  }

  invoke(text: string): Promise<string> {
    return callAgent(this.type, () => this.fn(text));
  }
}

export class CallableAdapter implements AgentAdapter {
  readonly type = "callable" as const;
  readonly agent: unknown;
  private readonly call: AgentMethod;

  constructor(agent: unknown, call: AgentMethod) {
    this.agent = agent;
    this.call = call;
  }

  invoke(text: string): Promise<string> {
    return callAgent(this.type, () => this.call(text));
  }
}
