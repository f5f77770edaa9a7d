import { describe, expect, it, vi } from "vitest";
import { guarded, type ReplyTarget } from "../src/bot/handlers.js";
import { AccessPolicy } from "../src/bot/access.js";
import { NotFoundError, ValidationError } from "../src/errors.js";

const ADMIN = 1;

function chat(userId?: number) {
  const reply = vi.fn(async (_text: string): Promise<unknown> => undefined);
  const ctx: ReplyTarget = { from: userId === undefined ? undefined : { id: userId }, reply };
  return { ctx, reply };
}

describe("guarded", () => {
  const access = new AccessPolicy([7], ADMIN);

  it("runs the handler for allowed users", async () => {
    const handler = vi.fn(async (_ctx: ReplyTarget, _userId: number) => undefined);
    const { ctx, reply } = chat(7);

    await guarded(access, handler)(ctx);

    expect(handler).toHaveBeenCalledWith(ctx, 7);
    expect(reply).not.toHaveBeenCalled();
  });

  it("turns away users outside the allow list", async () => {
    const handler = vi.fn(async (_ctx: ReplyTarget, _userId: number) => undefined);
    const { ctx, reply } = chat(8);

    await guarded(access, handler)(ctx);

    expect(handler).not.toHaveBeenCalled();
    expect(reply.mock.calls).toEqual([["Access denied."]]);
  });

  it("ignores updates without a sender", async () => {
    const handler = vi.fn(async (_ctx: ReplyTarget, _userId: number) => undefined);
    const { ctx, reply } = chat();

    await guarded(access, handler)(ctx);

    expect(handler).not.toHaveBeenCalled();
    expect(reply).not.toHaveBeenCalled();
  });

  it("shows validation and lookup errors as they are", async () => {
    const { ctx, reply } = chat(ADMIN);

    await guarded(access, async () => {
      throw new ValidationError("Usage: /select <store name>");
    })(ctx);
    await guarded(access, async () => {
      throw new NotFoundError('Store "Zeta" not found.');
    })(ctx);

    expect(reply.mock.calls).toEqual([["Usage: /select <store name>"], ['Store "Zeta" not found.']]);
  });

  it("replies with a capped error for anything else", async () => {
    const { ctx, reply } = chat(ADMIN);

    await guarded(access, async () => {
      throw new Error("x".repeat(600));
    })(ctx);

    expect(reply.mock.calls).toEqual([[`Error: ${"x".repeat(500)}`]]);
  });
});
