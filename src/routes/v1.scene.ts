import type { FastifyInstance } from "fastify";
import { InMemorySceneStore } from "../scene/memory-store.js";
import {
  AutoFixRequestBody,
  SCENE_VALIDATION_SCHEMA,
  SceneRequest,
  toObjectScope,
  type SceneRequestT,
} from "../schemas/scene-api.js";
import type { FindingsSummary } from "../services/findings-summary.js";
import {
  runAutoFix,
  runFixShaders,
  runValidate,
  type RunRequest,
} from "../services/validation-runner.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { log } from "../utils/telemetry.js";
import type { Finding } from "../validators/types.js";

interface FindingV1 {
  object_name: string;
  material_name: string;
  category: string;
  message: string;
  severity: string;
}

interface SceneValidationResponseV1 {
  schema: typeof SCENE_VALIDATION_SCHEMA;
  scene_name: string;
  findings: FindingV1[];
  summary: FindingsSummary;
  message: string;
}

function toFindingV1(finding: Finding): FindingV1 {
  return {
    object_name: finding.objectName,
    material_name: finding.materialName,
    category: finding.category,
    message: finding.message,
    severity: finding.severity,
  };
}

function toRunRequest(body: SceneRequestT): RunRequest {
  return {
    scope: toObjectScope(body.scope),
    exclusions: body.exclusions,
    groups: body.groups,
  };
}

function baseResponse(
  store: InMemorySceneStore,
  outcome: { findings: Finding[]; summary: FindingsSummary; message: string },
): SceneValidationResponseV1 {
  return {
    schema: SCENE_VALIDATION_SCHEMA,
    scene_name: store.sceneName,
    findings: outcome.findings.map(toFindingV1),
    summary: outcome.summary,
    message: outcome.message,
  };
}

/**
 * Scene audit endpoints. Each request carries its own scene snapshot; the
 * fixing endpoints return the repaired snapshot.
 */
export async function sceneRoutes(app: FastifyInstance): Promise<void> {
  app.post("/v1/scene/validate", async (req, reply) => {
    const parsed = SceneRequest.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, getRequestId(req)));
    }

    const store = InMemorySceneStore.fromSnapshot(parsed.data.scene);
    const outcome = runValidate(store, toRunRequest(parsed.data));
    return reply.send(baseResponse(store, outcome));
  });

  app.post("/v1/scene/fix-shaders", async (req, reply) => {
    const parsed = SceneRequest.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, getRequestId(req)));
    }

    const store = InMemorySceneStore.fromSnapshot(parsed.data.scene);
    const outcome = runFixShaders(store, toRunRequest(parsed.data));
    return reply.send({
      ...baseResponse(store, outcome),
      materials_fixed: outcome.materialsFixed,
      fix_message: outcome.fixMessage,
      scene: store.toSnapshot(),
    });
  });

  app.post("/v1/scene/auto-fix", async (req, reply) => {
    const parsed = AutoFixRequestBody.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(zodErrorToErrorV1(parsed.error, getRequestId(req)));
    }

    const store = InMemorySceneStore.fromSnapshot(parsed.data.scene);
    const options = parsed.data.options;
    const outcome = await runAutoFix(store, {
      ...toRunRequest(parsed.data),
      batchSize: options?.batch_size,
      pauseMs: options?.pause_ms,
      renameDefaultMeshData: options?.rename_default_mesh_data,
    });

    log.info(
      { request_id: getRequestId(req), status: outcome.status, failures: outcome.failures.length },
      "Scene auto-fix finished",
    );

    return reply.send({
      ...baseResponse(store, outcome),
      status: outcome.status,
      results: outcome.results,
      counters: outcome.counters,
      progress: outcome.progress,
      failures: outcome.failures.map((f) => ({ object_name: f.objectName, step: f.step, message: f.message })),
      fix_summary: outcome.fixSummary,
      scene: store.toSnapshot(),
    });
  });
}
