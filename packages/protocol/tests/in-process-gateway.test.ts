import { describe, it, expect, vi } from "vitest";
import type { IpcEnvelope } from "@linked-token/types";
import { InProcessGateway } from "../src/in-process-gateway.js";
import { buildReceiveCall, decodeCallMsg, decodeResultMsg, envelopeId } from "../src/codec.js";
import { BOB, DESTINATION, ORIGIN } from "./helpers.js";

function recordingHandler(fail?: Error) {
  const seen: IpcEnvelope[] = [];
  return {
    seen,
    handleEnvelope: vi.fn(async (envelope: IpcEnvelope) => {
      seen.push(envelope);
      if (fail !== undefined) throw fail;
    }),
  };
}

describe("InProcessGateway", () => {
  it("assigns increasing nonces per origin subnet", async () => {
    const gateway = new InProcessGateway();
    const transport = gateway.transportFor(ORIGIN);
    const call = buildReceiveCall(BOB, 1n);

    const first = await transport.dispatch(DESTINATION, call, 0n);
    const second = await transport.dispatch(DESTINATION, call, 0n);

    expect(first.localNonce).toBe(0n);
    expect(second.localNonce).toBe(1n);
    expect(first.kind).toBe("call");
    expect(first.from).toEqual(ORIGIN);
    expect(decodeCallMsg(first.message)).toEqual(call);
    expect(gateway.pending()).toHaveLength(2);
  });

  it("withdraws a queued envelope only while it is still queued", async () => {
    const gateway = new InProcessGateway();
    const transport = gateway.transportFor(ORIGIN);
    const first = await transport.dispatch(DESTINATION, buildReceiveCall(BOB, 1n), 0n);
    const second = await transport.dispatch(DESTINATION, buildReceiveCall(BOB, 2n), 0n);

    expect(transport.withdraw?.(first)).toBe(true);
    expect(gateway.pending()).toEqual([second]);
    expect(transport.withdraw?.(first)).toBe(false);
  });

  it("delivers a call and answers with an ok result", async () => {
    const gateway = new InProcessGateway();
    const destination = recordingHandler();
    const origin = recordingHandler();
    gateway.register(DESTINATION, destination);
    gateway.register(ORIGIN, origin);

    const call = await gateway.transportFor(ORIGIN).dispatch(DESTINATION, buildReceiveCall(BOB, 5n), 0n);
    const reports = await gateway.deliverAll();

    expect(reports.map((r) => r.outcome)).toEqual(["ok", undefined]);
    expect(destination.seen).toEqual([call]);
    expect(origin.seen).toHaveLength(1);

    const result = origin.seen[0];
    expect(result?.kind).toBe("result");
    expect(result?.originalNonce).toBe(call.localNonce);
    expect(result?.from).toEqual(DESTINATION);
    expect(result !== undefined && decodeResultMsg(result.message)).toEqual({
      id: envelopeId(call),
      outcome: "ok",
      ret: "0x",
    });
  });

  it("answers a rejected call with actor_error", async () => {
    const gateway = new InProcessGateway();
    gateway.register(DESTINATION, recordingHandler(new Error("nope")));
    const origin = recordingHandler();
    gateway.register(ORIGIN, origin);

    await gateway.transportFor(ORIGIN).dispatch(DESTINATION, buildReceiveCall(BOB, 5n), 0n);
    const [callReport] = await gateway.deliverAll();

    expect(callReport?.outcome).toBe("actor_error");
    expect(callReport?.error).toBeInstanceOf(Error);
    const result = origin.seen[0];
    expect(result !== undefined && decodeResultMsg(result.message).outcome).toBe("actor_error");
  });

  it("answers a call with no handler with system_error", async () => {
    const gateway = new InProcessGateway();
    const origin = recordingHandler();
    gateway.register(ORIGIN, origin);

    await gateway.transportFor(ORIGIN).dispatch(DESTINATION, buildReceiveCall(BOB, 5n), 0n);
    const reports = await gateway.deliverAll();

    expect(reports[0]).toMatchObject({ outcome: "system_error", delivered: false });
    const result = origin.seen[0];
    expect(result !== undefined && decodeResultMsg(result.message).outcome).toBe("system_error");
  });

  it("reports a result the origin rejects without answering it", async () => {
    const gateway = new InProcessGateway();
    gateway.register(DESTINATION, recordingHandler());
    gateway.register(ORIGIN, recordingHandler(new Error("unknown")));

    await gateway.transportFor(ORIGIN).dispatch(DESTINATION, buildReceiveCall(BOB, 5n), 0n);
    const reports = await gateway.deliverAll();

    expect(reports).toHaveLength(2);
    expect(reports[1]?.error).toEqual(new Error("unknown"));
    expect(gateway.pending()).toEqual([]);
  });

  it("delivers one envelope at a time and supports drop and inject", async () => {
    const gateway = new InProcessGateway();
    const destination = recordingHandler();
    gateway.register(DESTINATION, destination);

    const call = await gateway.transportFor(ORIGIN).dispatch(DESTINATION, buildReceiveCall(BOB, 5n), 0n);
    expect(gateway.drop()).toEqual(call);
    expect(await gateway.deliverNext()).toBeUndefined();

    gateway.inject(call);
    gateway.inject(call);
    await gateway.deliverNext();
    await gateway.deliverNext();
    expect(destination.handleEnvelope).toHaveBeenCalledTimes(2);
  });

  it("stops deliverAll at the delivery limit", async () => {
    const gateway = new InProcessGateway({ maxDeliveries: 1 });
    gateway.register(DESTINATION, recordingHandler());
    const transport = gateway.transportFor(ORIGIN);
    await transport.dispatch(DESTINATION, buildReceiveCall(BOB, 1n), 0n);
    await transport.dispatch(DESTINATION, buildReceiveCall(BOB, 2n), 0n);

    await expect(gateway.deliverAll()).rejects.toThrow("Delivery limit of 1 envelopes reached");
  });
});
