import assert from "node:assert/strict";
import {
  AdapterInvocationError,
  CallableAdapter,
  ChatAdapter,
  CustomAdapter,
  FunctionAdapter,
  InvalidAdapterConfigError,
  InvokeAdapter,
  OpenAIClientAdapter,
  RunAdapter,
  createAdapter,
} from "../../index";
import {
  EchoCallableAgent,
  EchoChatAgent,
  EchoInvokeAgent,
  EchoRunAgent,
  FakeOpenAIClient,
  TextProcessorAgent,
} from "../support/agents";

async function runChatAndRunAdapterTests(): Promise<void> {
  const chatAgent = new EchoChatAgent();
  const chat = createAdapter(chatAgent, "chat");
  assert.ok(chat instanceof ChatAdapter);
  assert.equal(chat.agent, chatAgent);
  assert.equal(await chat.invoke("hi"), "Chat: hi");
  assert.deepEqual(chatAgent.calls, ["hi"]);

  const run = createAdapter(new EchoRunAgent());
  assert.ok(run instanceof RunAdapter);
  assert.equal(await run.invoke("hi"), "Run: hi");

  const callable = createAdapter(new EchoCallableAgent());
  assert.ok(callable instanceof CallableAdapter);
  assert.equal(await callable.invoke("hi"), "Callable: hi");
}

async function runFunctionAdapterTests(): Promise<void> {
  const upper = (text: string) => text.toUpperCase();
  const adapter = createAdapter(upper);
  assert.ok(adapter instanceof FunctionAdapter);
  assert.equal(adapter.agent, upper);
  assert.equal(await adapter.invoke("hello"), "HELLO");

  assert.equal(await createAdapter(() => 42).invoke("x"), "42");

  await assert.rejects(
    () => createAdapter(() => undefined).invoke("x"),
    (error: unknown) => {
      assert.ok(error instanceof AdapterInvocationError);
      assert.equal(error.adapterType, "function");
      assert.equal(
        error.message,
        'Agent call through "function" adapter failed: agent returned a value that cannot be converted to text (undefined)',
      );
      return true;
    },
  );

  const boom = new Error("backend down");
  await assert.rejects(
    () =>
      createAdapter(async () => {
        throw boom;
      }).invoke("x"),
    (error: unknown) => {
      assert.ok(error instanceof AdapterInvocationError);
      assert.equal(error.cause, boom);
      assert.equal(
        error.message,
        'Agent call through "function" adapter failed: backend down',
      );
      return true;
    },
  );
}

async function runInvokeAdapterTests(): Promise<void> {
  const agent = {
    invoke: (input: Record<string, unknown>) =>
      input.input === "hi" ? { output: "yo" } : { output: "?" },
  };
  const adapter = createAdapter(agent);
  assert.ok(adapter instanceof InvokeAdapter);
  assert.equal(adapter.inputKey, "input");
  assert.equal(adapter.outputKey, "output");
  assert.equal(await adapter.invoke("hi"), "yo");

  const echo = new EchoInvokeAgent();
  const keyed = createAdapter(echo, "invoke", {
    inputKey: "question",
    outputKey: "answer",
  });
  await assert.rejects(() => keyed.invoke("hi"), /result has no "answer" key/);
  assert.deepEqual(echo.inputs, [{ question: "hi" }]);

  const stringResult = createAdapter({ invoke: () => "plain text" });
  assert.equal(await stringResult.invoke("hi"), "plain text");

  await assert.rejects(
    () => createAdapter({ invoke: () => ({ output: { nested: true } }) }).invoke("hi"),
    AdapterInvocationError,
  );

  assert.throws(
    () => createAdapter(echo, "invoke", { input_key: "question" }),
    (error: unknown) => {
      assert.ok(error instanceof InvalidAdapterConfigError);
      assert.equal(error.adapterType, "invoke");
      assert.deepEqual(error.issues, [
        "Unrecognized key(s) in object: 'input_key'",
      ]);
      return true;
    },
  );
}

async function runOpenAIClientAdapterTests(): Promise<void> {
  const client = new FakeOpenAIClient();

  assert.throws(
    () => createAdapter(client),
    (error: unknown) => {
      assert.ok(error instanceof InvalidAdapterConfigError);
      assert.equal(error.adapterType, "openai_client");
      assert.deepEqual(error.issues, ["model: Required"]);
      return true;
    },
  );

  const adapter = createAdapter(client, undefined, {
    model: "test-model",
    systemPrompt: "Be brief.",
    timeout: 5_000,
    modelSettings: { temperature: 0.2, ignored_setting: true },
  });
  assert.ok(adapter instanceof OpenAIClientAdapter);
  assert.equal(await adapter.invoke("hi"), "OpenAI: hi");

  const first = client.requests[0];
  assert.equal(first?.request.model, "test-model");
  assert.deepEqual(first?.request.messages, [
    { role: "system", content: "Be brief." },
    { role: "user", content: "hi" },
  ]);
  assert.equal(first?.request.temperature, 0.2);
  assert.equal(first?.request.ignored_setting, undefined);
  assert.deepEqual(first?.options, { timeout: 5_000 });

  const plain = createAdapter(client, "openai_client", { model: "m" });
  await plain.invoke("again");
  const second = client.requests[1];
  assert.deepEqual(second?.request.messages, [
    { role: "user", content: "again" },
  ]);
  assert.equal(second?.options, undefined);

  const empty = {
    chat: { completions: { create: () => ({ choices: [] }) } },
  };
  await assert.rejects(
    () => createAdapter(empty, "openai_client", { model: "m" }).invoke("hi"),
    AdapterInvocationError,
  );
}

async function runCustomAdapterTests(): Promise<void> {
  const agent = new TextProcessorAgent();
  const adapter = createAdapter(agent, "custom", {
    methodName: "processText",
    inputTransform: (text: string) => [text, { mode: "advanced" }],
    outputTransform: (raw: unknown) => String(raw),
  });
  assert.ok(adapter instanceof CustomAdapter);
  assert.equal(adapter.methodName, "processText");
  assert.equal(
    await adapter.invoke("Test message"),
    "Custom: Test message (mode: advanced)",
  );

  assert.throws(
    () =>
      createAdapter(agent, "custom", {
        methodName: "processText",
        inputTransform: (text: string) => [text],
      }),
    (error: unknown) => {
      assert.ok(error instanceof InvalidAdapterConfigError);
      assert.deepEqual(error.issues, [
        "outputTransform: outputTransform must be a function",
      ]);
      return true;
    },
  );

  assert.throws(
    () =>
      createAdapter(agent, "custom", {
        methodName: "process",
        inputTransform: (text: string) => [text],
        outputTransform: (raw: unknown) => String(raw),
      }),
    (error: unknown) => {
      assert.ok(error instanceof InvalidAdapterConfigError);
      assert.deepEqual(error.issues, [
        'methodName: agent has no method "process"',
      ]);
      return true;
    },
  );

  const failingTransform = createAdapter(agent, "custom", {
    methodName: "processText",
    inputTransform: (text: string) => [text],
    outputTransform: () => {
      throw new Error("unexpected shape");
    },
  });
  await assert.rejects(
    () => failingTransform.invoke("hi"),
    /Agent call through "custom" adapter failed: unexpected shape/,
  );

  const received: unknown[][] = [];
  const recorder = {
    handle: (...args: unknown[]) => {
      received.push(args);
      return "handled";
    },
  };
  const notAList = createAdapter(recorder, "custom", {
    methodName: "handle",
    inputTransform: (text: string) => text,
    outputTransform: (raw: unknown) => String(raw),
  });
  await assert.rejects(
    () => notAList.invoke("abc"),
    (error: unknown) => {
      assert.ok(error instanceof AdapterInvocationError);
      assert.equal(
        error.message,
        'Agent call through "custom" adapter failed: inputTransform must return an argument list',
      );
      return true;
    },
  );
  assert.deepEqual(received, []);
}

export async function runAdapterUnitTests(): Promise<void> {
  await runChatAndRunAdapterTests();
  await runFunctionAdapterTests();
  await runInvokeAdapterTests();
  await runOpenAIClientAdapterTests();
  await runCustomAdapterTests();
}
