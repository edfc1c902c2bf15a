import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { z } from "zod";
import { httpError } from "../lib/httpError.js";
import type { EtlRunner } from "../processor.js";
import type { RawTable } from "../types.js";

const transformBodySchema = z.object({
  columns: z.array(z.string().min(1)).optional(),
  rows: z.array(z.record(z.union([z.string(), z.number(), z.null()])))
});

type TransformBody = z.infer<typeof transformBodySchema>;

function toRawTable(body: TransformBody): RawTable {
  if (body.columns) {
    return { columns: body.columns, rows: body.rows };
  }
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of body.rows) {
    for (const column of Object.keys(row)) {
      if (seen.has(column)) continue;
      seen.add(column);
      columns.push(column);
    }
  }
  return { columns, rows: body.rows };
}

export interface WarehouseRouteOptions extends FastifyPluginOptions {
  runner: Pick<EtlRunner, "transform" | "run" | "latest">;
}

export async function warehouseRoutes(fastify: FastifyInstance, options: WarehouseRouteOptions) {
  const { runner } = options;

  fastify.post("/v1/transform", async (request) => {
    const body = transformBodySchema.parse(request.body);
    return runner.transform(toRawTable(body));
  });

  fastify.post("/v1/runs", async () => {
    return runner.run();
  });

  fastify.get("/v1/runs/latest", async () => {
    const latest = runner.latest();
    if (!latest) {
      throw httpError(404, "no_runs", "No ETL run has completed yet.");
    }
    return latest;
  });
}
