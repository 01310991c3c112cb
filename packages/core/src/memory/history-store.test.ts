import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createHistoryStore } from "./history-store.js";
import { createEventBus } from "../bus/index.js";
import {
  HistoryEventType,
  InvalidConfigurationError,
  assistantMessage,
  userMessage,
  type Message,
} from "@storyloom/sdk";
import { createCharCounter } from "@storyloom/sdk/testing";

const countTokens = createCharCounter();

function contents(messages: Message[]): string[] {
  return messages.map((m) => m.content);
}

describe("HistoryStore", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("starts Clean and empty with the default budget", () => {
      const store = createHistoryStore();
      expect(store.hasPendingProposal).toBe(false);
      expect(store.activeSequence()).toEqual([]);
      expect(store.maxTokens).toBe(12000);
    });

    it("rejects maxTokens below 1", () => {
      expect(() => createHistoryStore({ maxTokens: 0 })).toThrow(InvalidConfigurationError);
    });

    it("uses the given id", () => {
      expect(createHistoryStore({ id: "store-a" }).id).toBe("store-a");
    });

    it("generates distinct ids for independent stores", () => {
      expect(createHistoryStore().id).not.toBe(createHistoryStore().id);
    });
  });

  describe("addMessage()", () => {
    it("moves Clean to Proposed and appends to the proposal only", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("hi"));

      expect(store.hasPendingProposal).toBe(true);
      expect(contents(store.activeSequence())).toEqual(["hi"]);
      expect(store.committedSequence()).toEqual([]);
    });

    it("builds the proposal from the committed history", () => {
      const store = createHistoryStore({ countTokens });
      store.reset([userMessage("a"), assistantMessage("b")]);
      store.addMessage(userMessage("c"));

      expect(contents(store.activeSequence())).toEqual(["a", "b", "c"]);
      expect(contents(store.committedSequence())).toEqual(["a", "b"]);
    });

    it("truncates the proposal to the budget", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 5 });
      store.addMessage(userMessage("abc"));
      store.addMessage(assistantMessage("de"));
      store.addMessage(userMessage("fg"));

      expect(contents(store.activeSequence())).toEqual(["de", "fg"]);
      expect(store.tokenUsage()).toEqual({ used: 4, max: 5, messages: 2 });
    });

    it("returns a warning when the new message alone exceeds the budget", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 3 });
      store.addMessage(userMessage("ok"));
      const warning = store.addMessage(assistantMessage("much too long"));

      expect(warning).toEqual({
        kind: "oversized_message",
        tokens: 13,
        maxTokens: 3,
        preview: "much too long",
      });
      expect(contents(store.activeSequence())).toEqual(["much too long"]);
    });

    it("returns null when the budget is met", () => {
      const store = createHistoryStore({ countTokens });
      expect(store.addMessage(userMessage("hi"))).toBeNull();
    });

    it("stores a frozen copy of the message it was given", () => {
      const store = createHistoryStore({ countTokens });
      const input = { role: "user" as const, content: "draft" };
      store.addMessage(input);
      input.content = "changed";

      const [stored] = store.activeSequence();
      expect(stored.content).toBe("draft");
      expect(Object.isFrozen(stored)).toBe(true);
    });
  });

  describe("addMessages()", () => {
    it("appends a batch with a single truncation", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 4 });
      store.addMessages([userMessage("aa"), assistantMessage("bb"), userMessage("cc")]);

      expect(contents(store.activeSequence())).toEqual(["bb", "cc"]);
      expect(store.hasPendingProposal).toBe(true);
    });
  });

  describe("commitProposal()", () => {
    it("promotes the proposal and returns to Clean", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("m1"));
      store.addMessage(assistantMessage("m2"));
      store.commitProposal();

      expect(store.hasPendingProposal).toBe(false);
      expect(contents(store.committedSequence())).toEqual(["m1", "m2"]);
    });

    it("is idempotent", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("m1"));
      store.commitProposal();
      const once = store.committedSequence();

      store.commitProposal();
      expect(store.committedSequence()).toEqual(once);
      expect(store.hasPendingProposal).toBe(false);
    });

    it("is a no-op when Clean", () => {
      const bus = createEventBus();
      const handler = vi.fn();
      bus.on(HistoryEventType.COMMITTED, handler);
      const store = createHistoryStore({ countTokens, bus });

      store.commitProposal();
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe("discardProposal()", () => {
    it("reverts to the committed history from before the additions", () => {
      const store = createHistoryStore({ countTokens });
      store.reset([userMessage("a"), assistantMessage("b")]);
      const before = store.activeSequence();

      store.addMessage(userMessage("c"));
      store.addMessage(assistantMessage("d"));
      store.discardProposal();

      expect(store.activeSequence()).toEqual(before);
      expect(store.hasPendingProposal).toBe(false);
    });

    it("restores messages the proposal had truncated away", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 4 });
      store.reset([userMessage("aa"), assistantMessage("bb")]);
      store.addMessage(userMessage("cccc"));
      expect(contents(store.activeSequence())).toEqual(["cccc"]);

      store.discardProposal();
      expect(contents(store.activeSequence())).toEqual(["aa", "bb"]);
    });

    it("is a no-op when Clean", () => {
      const store = createHistoryStore({ countTokens });
      store.reset([userMessage("a")]);
      store.discardProposal();
      expect(contents(store.activeSequence())).toEqual(["a"]);
    });
  });

  describe("prepareForResponse()", () => {
    it("commits the active sequence as the new baseline", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("guidance"));
      store.prepareForResponse();

      expect(store.hasPendingProposal).toBe(false);
      expect(contents(store.committedSequence())).toEqual(["guidance"]);
    });

    it("keeps the sent history when the next addition is discarded", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("guidance"));
      store.prepareForResponse();
      store.addMessage(assistantMessage("reply"));
      store.discardProposal();

      expect(contents(store.activeSequence())).toEqual(["guidance"]);
    });

    it("lets a mid-flight edit and the late reply both land", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("guidance"));
      store.prepareForResponse();
      const inFlight = store.activeSequence();

      store.addMessage(userMessage("x"));
      store.addMessage(assistantMessage("result"));

      expect(contents(store.activeSequence())).toEqual(["guidance", "x", "result"]);
      expect(contents(inFlight)).toEqual(["guidance"]);
    });
  });

  describe("isolation", () => {
    it("reads return fresh arrays", () => {
      const store = createHistoryStore({ countTokens });
      store.addMessage(userMessage("a"));

      const first = store.activeSequence();
      first.push(userMessage("intruder"));

      expect(contents(store.activeSequence())).toEqual(["a"]);
      expect(store.activeSequence()).not.toBe(store.activeSequence());
    });

    it("mutating the proposal never changes the committed history", () => {
      const store = createHistoryStore({ countTokens });
      store.reset([userMessage("a")]);
      const committedBefore = store.committedSequence();

      store.addMessage(userMessage("b"));
      store.addMessage(userMessage("c"));

      expect(store.committedSequence()).toEqual(committedBefore);
    });

    it("reset() copies the caller's array", () => {
      const store = createHistoryStore({ countTokens });
      const seed = [userMessage("a")];
      store.reset(seed);
      seed.push(userMessage("b"));

      expect(contents(store.committedSequence())).toEqual(["a"]);
    });
  });

  describe("reset() and clear()", () => {
    it("reset() replaces history, truncates and clears the proposal", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 3 });
      store.addMessage(userMessage("pending"));
      store.reset([userMessage("aa"), assistantMessage("b"), userMessage("cc")]);

      expect(store.hasPendingProposal).toBe(false);
      expect(contents(store.activeSequence())).toEqual(["b", "cc"]);
    });

    it("clear() empties everything", () => {
      const store = createHistoryStore({ countTokens });
      store.reset([userMessage("a")]);
      store.addMessage(userMessage("b"));
      store.clear();

      expect(store.activeSequence()).toEqual([]);
      expect(store.committedSequence()).toEqual([]);
      expect(store.hasPendingProposal).toBe(false);
    });
  });

  describe("setMaxTokens()", () => {
    it("re-truncates the active sequence immediately", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 10 });
      store.reset([userMessage("aaa"), assistantMessage("bbb"), userMessage("cc")]);

      store.setMaxTokens(5);

      expect(store.maxTokens).toBe(5);
      expect(contents(store.activeSequence())).toEqual(["bbb", "cc"]);
    });

    it("bounds the committed history behind a pending proposal too", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 10 });
      store.reset([userMessage("aaa"), assistantMessage("bbb")]);
      store.addMessage(userMessage("c"));

      store.setMaxTokens(4);
      expect(contents(store.activeSequence())).toEqual(["bbb", "c"]);

      store.discardProposal();
      expect(contents(store.activeSequence())).toEqual(["bbb"]);
    });

    it("rejects an invalid budget and keeps the previous one", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 10 });
      store.reset([userMessage("aaaa")]);

      expect(() => store.setMaxTokens(0)).toThrow(InvalidConfigurationError);
      expect(() => store.setMaxTokens(2.5)).toThrow(InvalidConfigurationError);
      expect(store.maxTokens).toBe(10);
      expect(contents(store.activeSequence())).toEqual(["aaaa"]);
    });

    it("returns a warning when the newest message no longer fits", () => {
      const store = createHistoryStore({ countTokens, maxTokens: 10 });
      store.reset([userMessage("abcdef")]);

      const warning = store.setMaxTokens(2);
      expect(warning?.tokens).toBe(6);
      expect(contents(store.activeSequence())).toEqual(["abcdef"]);
    });
  });

  describe("token counting failures", () => {
    it("falls back to the UTF-8 byte length when the counter throws", () => {
      const store = createHistoryStore({
        maxTokens: 100,
        countTokens: () => {
          throw new Error("unsupported character");
        },
      });
      store.addMessage(userMessage("héllo"));

      expect(store.tokenUsage().used).toBe(6);
    });

    it("falls back when the counter returns an invalid number", () => {
      const store = createHistoryStore({ maxTokens: 100, countTokens: () => Number.NaN });
      store.addMessage(userMessage("abc"));

      expect(store.tokenUsage().used).toBe(3);
    });

    it("keeps the budget with worst-case costs", () => {
      const store = createHistoryStore({
        maxTokens: 4,
        countTokens: (text) => {
          if (text === "ok") return 1;
          throw new Error("fail");
        },
      });
      store.addMessage(userMessage("abc"));
      store.addMessage(userMessage("ok"));

      expect(contents(store.activeSequence())).toEqual(["abc", "ok"]);
      store.addMessage(userMessage("ok"));
      expect(contents(store.activeSequence())).toEqual(["ok", "ok"]);
    });
  });

  describe("events", () => {
    it("publishes transitions on the bus with the store id", () => {
      const bus = createEventBus();
      const types: string[] = [];
      bus.onAny((event) => {
        types.push(event.type);
      });
      const store = createHistoryStore({ countTokens, bus, id: "s1", maxTokens: 3 });

      store.addMessage(userMessage("ab"));
      store.addMessage(assistantMessage("cd"));
      store.commitProposal();
      store.addMessage(userMessage("e"));
      store.discardProposal();

      expect(types).toEqual([
        HistoryEventType.PROPOSED,
        HistoryEventType.TRUNCATED,
        HistoryEventType.PROPOSED,
        HistoryEventType.COMMITTED,
        HistoryEventType.PROPOSED,
        HistoryEventType.DISCARDED,
      ]);
    });

    it("publishes policy warnings", () => {
      const bus = createEventBus();
      const handler = vi.fn();
      bus.on(HistoryEventType.POLICY_WARNING, handler);
      const store = createHistoryStore({ countTokens, bus, id: "s2", maxTokens: 2 });

      store.addMessage(userMessage("abc"));

      expect(handler).toHaveBeenCalledOnce();
      expect(handler.mock.calls[0][0].payload).toEqual({
        storeId: "s2",
        warning: { kind: "oversized_message", tokens: 3, maxTokens: 2, preview: "abc" },
      });
    });
  });
});
