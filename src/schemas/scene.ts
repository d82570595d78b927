import { z } from "zod";

/**
 * Scene snapshot schemas.
 *
 * A snapshot is the JSON form of everything the audit engine reads from a
 * Scene Store. Cross-entity references are always names and are resolved
 * through the store at use time.
 */

export const Vec3 = z.object({ x: z.number(), y: z.number(), z: z.number() });

export const ObjectType = z.enum([
  "MESH",
  "CURVE",
  "SURFACE",
  "META",
  "FONT",
  "ARMATURE",
  "EMPTY",
  "CAMERA",
  "LIGHT",
]);

export const InteractionMode = z.enum(["OBJECT", "EDIT", "WEIGHT_PAINT", "SCULPT", "POSE"]);

// -----------------------------------------------------------------------------
// Modifiers (tagged by type)
// -----------------------------------------------------------------------------

const ModifierBase = z.object({ name: z.string().min(1), enabled: z.boolean().default(true) });

export const ArrayModifier = ModifierBase.extend({
  type: z.literal("ARRAY"),
  count: z.number().int().positive().default(2),
  useObjectOffset: z.boolean().default(false),
  offsetObject: z.string().nullable().default(null),
});

export const BooleanModifier = ModifierBase.extend({
  type: z.literal("BOOLEAN"),
  operation: z.enum(["DIFFERENCE", "UNION", "INTERSECT"]).default("DIFFERENCE"),
  object: z.string().nullable().default(null),
});

export const ShrinkwrapModifier = ModifierBase.extend({
  type: z.literal("SHRINKWRAP"),
  target: z.string().nullable().default(null),
});

export const ArmatureModifier = ModifierBase.extend({
  type: z.literal("ARMATURE"),
  object: z.string().nullable().default(null),
});

export const SurfaceDeformModifier = ModifierBase.extend({
  type: z.literal("SURFACE_DEFORM"),
  target: z.string().nullable().default(null),
  isBound: z.boolean().default(false),
});

export const DataTransferModifier = ModifierBase.extend({
  type: z.literal("DATA_TRANSFER"),
  object: z.string().nullable().default(null),
});

export const PassThroughModifierType = z.enum([
  "SUBSURF",
  "MIRROR",
  "BEVEL",
  "SOLIDIFY",
  "DECIMATE",
  "WEIGHTED_NORMAL",
  "TRIANGULATE",
]);

export const PassThroughModifier = ModifierBase.extend({
  type: PassThroughModifierType,
});

export const Modifier = z.discriminatedUnion("type", [
  ArrayModifier,
  BooleanModifier,
  ShrinkwrapModifier,
  ArmatureModifier,
  SurfaceDeformModifier,
  DataTransferModifier,
  PassThroughModifier,
]);

// -----------------------------------------------------------------------------
// Drivers
// -----------------------------------------------------------------------------

export const DriverTargetIdType = z.enum(["OBJECT", "MESH", "MATERIAL", "SCENE", "IMAGE"]);

export const DriverTarget = z.object({
  idType: DriverTargetIdType.default("OBJECT"),
  id: z.string().nullable().default(null),
  dataPath: z.string().default(""),
});

export const DriverVariable = z.object({
  name: z.string().min(1),
  targets: z.array(DriverTarget).default([]),
});

export const Driver = z.object({
  type: z.enum(["SCRIPTED", "AVERAGE", "SUM", "MIN", "MAX"]).default("SCRIPTED"),
  expression: z.string().default(""),
  isValid: z.boolean().default(true),
  variables: z.array(DriverVariable).default([]),
});

export const DriverCurve = z.object({
  dataPath: z.string().min(1),
  arrayIndex: z.number().int().nonnegative().default(0),
  driver: Driver,
});

export const AnimationData = z.object({
  drivers: z.array(DriverCurve).default([]),
});

// -----------------------------------------------------------------------------
// Objects
// -----------------------------------------------------------------------------

export const VertexWeight = z.object({
  index: z.number().int().nonnegative(),
  weight: z.number().min(0),
});

export const VertexGroup = z.object({
  name: z.string().min(1),
  weights: z.array(VertexWeight).default([]),
});

export const Constraint = z.object({
  name: z.string().min(1),
  type: z.string().default("COPY_LOCATION"),
  target: z.string().nullable().default(null),
});

export const SceneObject = z.object({
  name: z.string().min(1),
  type: ObjectType,
  location: Vec3.default({ x: 0, y: 0, z: 0 }),
  rotation: Vec3.default({ x: 0, y: 0, z: 0 }),
  scale: Vec3.default({ x: 1, y: 1, z: 1 }),
  parent: z.string().nullable().default(null),
  data: z.string().nullable().default(null),
  modifiers: z.array(Modifier).default([]),
  materialSlots: z.array(z.string().nullable()).default([]),
  animation: AnimationData.nullable().default(null),
  vertexGroups: z.array(VertexGroup).default([]),
  constraints: z.array(Constraint).default([]),
  mode: InteractionMode.default("OBJECT"),
  collections: z.array(z.string()).default([]),
  inViewLayer: z.boolean().default(true),
  selected: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Data blocks
// -----------------------------------------------------------------------------

export const ShapeKey = z.object({
  name: z.string().min(1),
  vertexGroup: z.string().nullable().default(null),
});

export const MeshData = z.object({
  name: z.string().min(1),
  vertexCount: z.number().int().nonnegative().default(0),
  edgeCount: z.number().int().nonnegative().default(0),
  polygonCount: z.number().int().nonnegative().default(0),
  uvLayers: z.array(z.string()).default([]),
  shapeKeys: z.array(ShapeKey).default([]),
  positions: z.array(Vec3).optional(),
});

export const CurveData = z.object({
  name: z.string().min(1),
  positions: z.array(Vec3).optional(),
});

export const ArmatureData = z.object({
  name: z.string().min(1),
  bones: z.array(z.string()).default([]),
});

// -----------------------------------------------------------------------------
// Materials and images
// -----------------------------------------------------------------------------

export const ShaderNodeType = z.enum([
  "OUTPUT_MATERIAL",
  "BSDF_PRINCIPLED",
  "EMISSION",
  "BSDF_DIFFUSE",
  "BSDF_GLOSSY",
  "BSDF_TRANSPARENT",
  "BSDF_HAIR",
  "BSDF_HAIR_PRINCIPLED",
  "SUBSURFACE_SCATTERING",
  "BSDF_ANISOTROPIC",
  "BSDF_SHEEN",
  "BSDF_TOON",
  "MIX_SHADER",
  "TEX_IMAGE",
  "TEX_ENVIRONMENT",
  "TEX_NOISE",
  "NORMAL_MAP",
  "MAPPING",
  "TEX_COORD",
]);

export const SocketValue = z.union([z.number(), z.array(z.number()), z.string(), z.boolean()]);

export const ShaderNode = z.object({
  name: z.string().min(1),
  type: ShaderNodeType,
  location: z.tuple([z.number(), z.number()]).default([0, 0]),
  image: z.string().nullable().optional(),
  inputs: z.record(z.string(), SocketValue).default({}),
});

export const NodeLink = z.object({
  fromNode: z.string().min(1),
  fromSocket: z.string().min(1),
  toNode: z.string().min(1),
  toSocket: z.string().min(1),
});

export const NodeTree = z.object({
  nodes: z.array(ShaderNode).default([]),
  links: z.array(NodeLink).default([]),
});

export const Material = z.object({
  name: z.string().min(1),
  useNodes: z.boolean().default(true),
  nodeTree: NodeTree.nullable().default(null),
});

export const ImageSource = z.enum(["FILE", "GENERATED", "MOVIE", "SEQUENCE", "VIEWER"]);

export const Image = z.object({
  name: z.string().min(1),
  source: ImageSource.default("FILE"),
  filepath: z.string().default(""),
  packed: z.boolean().default(false),
  hasData: z.boolean().default(true),
  width: z.number().int().nonnegative().default(0),
  height: z.number().int().nonnegative().default(0),
});

// -----------------------------------------------------------------------------
// Snapshot
// -----------------------------------------------------------------------------

const SceneSnapshotShape = z.object({
  name: z.string().default("Scene"),
  objects: z.array(SceneObject).default([]),
  meshes: z.array(MeshData).default([]),
  curves: z.array(CurveData).default([]),
  armatures: z.array(ArmatureData).default([]),
  materials: z.array(Material).default([]),
  images: z.array(Image).default([]),
  collections: z.array(z.string()).default([]),
  // Paths the host reports as present on disk; used for texture file checks
  files: z.array(z.string()).default([]),
  activeObject: z.string().nullable().default(null),
});

function duplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) dupes.add(name);
    seen.add(name);
  }
  return [...dupes];
}

/**
 * Object names are unique; mesh, curve and armature data share one namespace
 * so an object's `data` name resolves to exactly one block.
 */
export const SceneSnapshot = SceneSnapshotShape.superRefine((scene, ctx) => {
  for (const name of duplicates(scene.objects.map((o) => o.name))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["objects"], message: `Duplicate object name '${name}'` });
  }
  const dataNames = [...scene.meshes, ...scene.curves, ...scene.armatures].map((d) => d.name);
  for (const name of duplicates(dataNames)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["meshes"], message: `Duplicate data block name '${name}'` });
  }
  for (const name of duplicates(scene.materials.map((m) => m.name))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["materials"], message: `Duplicate material name '${name}'` });
  }
  for (const name of duplicates(scene.images.map((i) => i.name))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["images"], message: `Duplicate image name '${name}'` });
  }
});

export type Vec3T = z.infer<typeof Vec3>;
export type ObjectTypeT = z.infer<typeof ObjectType>;
export type InteractionModeT = z.infer<typeof InteractionMode>;
export type ModifierT = z.infer<typeof Modifier>;
export type ModifierTypeT = ModifierT["type"];
export type DriverTargetT = z.infer<typeof DriverTarget>;
export type DriverVariableT = z.infer<typeof DriverVariable>;
export type DriverT = z.infer<typeof Driver>;
export type DriverCurveT = z.infer<typeof DriverCurve>;
export type AnimationDataT = z.infer<typeof AnimationData>;
export type VertexGroupT = z.infer<typeof VertexGroup>;
export type ConstraintT = z.infer<typeof Constraint>;
export type SceneObjectT = z.infer<typeof SceneObject>;
export type ShapeKeyT = z.infer<typeof ShapeKey>;
export type MeshDataT = z.infer<typeof MeshData>;
export type CurveDataT = z.infer<typeof CurveData>;
export type ArmatureDataT = z.infer<typeof ArmatureData>;
export type ShaderNodeTypeT = z.infer<typeof ShaderNodeType>;
export type ShaderNodeT = z.infer<typeof ShaderNode>;
export type NodeLinkT = z.infer<typeof NodeLink>;
export type NodeTreeT = z.infer<typeof NodeTree>;
export type MaterialT = z.infer<typeof Material>;
export type ImageT = z.infer<typeof Image>;
export type SceneSnapshotT = z.infer<typeof SceneSnapshot>;
/** Snapshot as accepted at the API boundary (before defaults are applied) */
export type SceneSnapshotInput = z.input<typeof SceneSnapshot>;
