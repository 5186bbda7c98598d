import OpenAI from "openai";
import { beforeEach, describe, expect, it } from "vitest";
import {
  OpenAIChatClient,
  isTransientOpenAIError,
  type ChatCompletionsApi,
} from "../OpenAIChatClient.js";
import { SummarizerError } from "../../utils/errors.js";

type CreateParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: "cmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
  };
}

/**
 * Plays back a scripted list of outcomes, one per create() call
 */
class ScriptedCompletions implements ChatCompletionsApi {
  requests: CreateParams[] = [];
  private outcomes: Array<Error | string | null>;

  constructor(outcomes: Array<Error | string | null>) {
    this.outcomes = outcomes;
  }

  chat = {
    completions: {
      create: async (body: CreateParams): Promise<OpenAI.Chat.ChatCompletion> => {
        this.requests.push(body);
        const outcome = this.outcomes.shift();
        if (outcome instanceof Error) {
          throw outcome;
        }
        return completion(outcome ?? null);
      },
    },
  };
}

describe("isTransientOpenAIError", () => {
  it("treats SDK connection and timeout errors as transient", () => {
    expect(isTransientOpenAIError(new OpenAI.APIConnectionError({ message: "socket hang up" }))).toBe(
      true
    );
    expect(isTransientOpenAIError(new OpenAI.APIConnectionTimeoutError())).toBe(true);
  });

  it("treats anything else as unexpected", () => {
    expect(isTransientOpenAIError(new Error("bad"))).toBe(false);
    expect(isTransientOpenAIError("bad")).toBe(false);
  });
});

describe("OpenAIChatClient.complete", () => {
  let waits: number[];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };

  beforeEach(() => {
    waits = [];
  });

  it("sends one user message with the model and token limit", async () => {
    const api = new ScriptedCompletions(["- bullet"]);
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    await expect(client.complete("Summarise this", 400)).resolves.toBe("- bullet");
    expect(api.requests).toEqual([
      {
        model: "test-model",
        messages: [{ role: "user", content: "Summarise this" }],
        max_tokens: 400,
      },
    ]);
    expect(waits).toEqual([]);
  });

  it("backs off exponentially on connection errors and then succeeds", async () => {
    const api = new ScriptedCompletions([
      new OpenAI.APIConnectionError({ message: "reset" }),
      new OpenAI.APIConnectionError({ message: "reset again" }),
      "recovered",
    ]);
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    await expect(client.complete("prompt", 400)).resolves.toBe("recovered");
    expect(api.requests).toHaveLength(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it("waits the base backoff after an unexpected error", async () => {
    const api = new ScriptedCompletions([new Error("bad payload"), "ok"]);
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    await expect(client.complete("prompt", 400)).resolves.toBe("ok");
    expect(waits).toEqual([2000]);
  });

  it("raises SummarizerError carrying the last error after three attempts", async () => {
    const last = new OpenAI.APIConnectionError({ message: "third failure" });
    const api = new ScriptedCompletions([
      new OpenAI.APIConnectionError({ message: "first failure" }),
      new OpenAI.APIConnectionError({ message: "second failure" }),
      last,
    ]);
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    const error = await client.complete("prompt", 400).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SummarizerError);
    expect(error instanceof SummarizerError && error.cause).toBe(last);
    expect(api.requests).toHaveLength(3);
    expect(waits).toEqual([1000, 2000]);
  });

  it("returns an empty string for a completion with no content", async () => {
    const api = new ScriptedCompletions([null]);
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    await expect(client.complete("prompt", 800)).resolves.toBe("");
    expect(waits).toEqual([]);
  });

  it("keeps at most one request in flight", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const order: string[] = [];
    const api: ChatCompletionsApi = {
      chat: {
        completions: {
          create: async (body) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            const message = body.messages[0];
            const prompt = typeof message.content === "string" ? message.content : "";
            order.push(`start:${prompt}`);
            await new Promise((resolve) => setTimeout(resolve, 10));
            order.push(`end:${prompt}`);
            inFlight--;
            return completion(`answer to ${prompt}`);
          },
        },
      },
    };
    const client = new OpenAIChatClient({ client: api, model: "test-model", sleep });

    const answers = await Promise.all([client.complete("one", 400), client.complete("two", 400)]);

    expect(answers).toEqual(["answer to one", "answer to two"]);
    expect(maxInFlight).toBe(1);
    expect(order).toEqual(["start:one", "end:one", "start:two", "end:two"]);
  });
});
