import Fastify from "fastify";

export interface StubReply {
  status?: number;
  body: unknown;
  delayMs?: number;
}

export type StubHandler = (objects: Record<string, unknown>) => StubReply;

export interface MoonrakerStub {
  url: string;
  requests: Array<Record<string, unknown>>;
  handler: StubHandler;
  close(): Promise<void>;
}

export const PRINTER_STATE: Record<string, Record<string, unknown>> = {
  extruder: { temperature: 215.3, target: 215 },
  heater_bed: { temperature: 60.1, target: 60 },
  "temperature_fan MCU_Fans": { temperature: 41.2 },
  "temperature_sensor CHAMBER": { temperature: 35.5 },
  "temperature_sensor NucBox": { temperature: 48 },
  virtual_sdcard: {
    file_path: "/home/pi/printer_data/gcodes/benchy.gcode",
    progress: 0.4237,
    is_active: true,
    file_position: 1200,
    file_size: 5000,
  },
  fan: { speed: 0.65 },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Answer a query the way Moonraker does: objects it does not know are left
 * out of `result.status`.
 */
export function answerQuery(
  objects: Record<string, unknown>,
  state: Record<string, Record<string, unknown>> = PRINTER_STATE,
): StubReply {
  const status: Record<string, Record<string, unknown>> = {};
  for (const name of Object.keys(objects)) {
    const values = state[name];
    if (values) status[name] = values;
  }
  return { body: { result: { eventtime: 1234.5, status } } };
}

/**
 * In-process stand-in for Moonraker's `printer/objects/query` on 127.0.0.1.
 */
export async function startMoonrakerStub(
  handler: StubHandler = (objects) => answerQuery(objects),
): Promise<MoonrakerStub> {
  const app = Fastify({ logger: false });

  const stub: MoonrakerStub = {
    url: "",
    requests: [],
    handler,
    close: () => app.close(),
  };

  app.post("/printer/objects/query", async (request, reply) => {
    const body = request.body;
    const objects = isRecord(body) && isRecord(body.objects) ? body.objects : {};
    stub.requests.push(objects);

    const answer = stub.handler(objects);
    if (answer.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, answer.delayMs));
    }
    reply.code(answer.status ?? 200);
    return answer.body;
  });

  await app.listen({ host: "127.0.0.1", port: 0 });
  const address = app.server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  stub.url = `http://127.0.0.1:${port}/printer/objects/query`;
  return stub;
}
