/**
 * Quad Program Variants
 *
 * The four programs form a closed set, described as data: capabilities,
 * geometry source, bind group layout and the pipeline state the host is
 * expected to create them with.
 */

import type { Mat4 } from "../math/mat4";
import { isFiniteVector } from "../math/vec";
import {
  createSampler,
  type Sampler,
  type SamplerDescriptor,
  type Texture2D,
} from "./sampler";
import type { CameraUniform, ModelUniform, PanelUniform } from "./types";

export type ShaderVariantName = "panel" | "sprite" | "texture" | "glyph";

export const SHADER_VARIANTS: readonly ShaderVariantName[] = [
  "panel",
  "sprite",
  "texture",
  "glyph",
];

/** What a bind group slot must hold */
export type BindGroupKind = "camera" | "panel" | "model" | "texture";

export interface VariantCapabilities {
  hasTexture: boolean;
  hasPanelSelection: boolean;
  hasPackedColor: boolean;
}

export type BlendMode = "alpha" | "replace";

export interface VariantDescriptor {
  name: ShaderVariantName;
  capabilities: VariantCapabilities;
  /** Corner source: built-in ordinal or explicit vertex buffer */
  geometry: "procedural" | "explicit";
  /** Bind group kinds by group index */
  bindGroups: readonly BindGroupKind[];
  topology: "triangle-strip";
  cullBackFaces: boolean;
  blend: BlendMode;
  verticesPerInstance: number;
}

export const VARIANTS: Readonly<Record<ShaderVariantName, VariantDescriptor>> = {
  panel: {
    name: "panel",
    capabilities: { hasTexture: false, hasPanelSelection: true, hasPackedColor: false },
    geometry: "procedural",
    bindGroups: ["camera", "panel", "model"],
    topology: "triangle-strip",
    cullBackFaces: true,
    blend: "alpha",
    verticesPerInstance: 4,
  },
  sprite: {
    name: "sprite",
    capabilities: { hasTexture: true, hasPanelSelection: false, hasPackedColor: false },
    geometry: "explicit",
    bindGroups: ["camera", "texture"],
    topology: "triangle-strip",
    cullBackFaces: false,
    blend: "replace",
    verticesPerInstance: 4,
  },
  texture: {
    name: "texture",
    capabilities: { hasTexture: true, hasPanelSelection: false, hasPackedColor: false },
    geometry: "procedural",
    bindGroups: ["camera", "texture"],
    topology: "triangle-strip",
    cullBackFaces: false,
    blend: "replace",
    verticesPerInstance: 4,
  },
  glyph: {
    name: "glyph",
    capabilities: { hasTexture: true, hasPanelSelection: false, hasPackedColor: true },
    geometry: "procedural",
    bindGroups: ["camera", "texture", "model"],
    topology: "triangle-strip",
    cullBackFaces: true,
    blend: "alpha",
    verticesPerInstance: 4,
  },
};

// ---------------------------------------------------------------------------
// Bind groups
// ---------------------------------------------------------------------------

export type BindingResource =
  | { type: "camera"; value: CameraUniform }
  | { type: "panel"; value: PanelUniform }
  | { type: "model"; value: ModelUniform }
  | { type: "texture"; value: Texture2D }
  | { type: "sampler"; value: SamplerDescriptor };

export interface BindGroupEntry {
  binding: number;
  resource: BindingResource;
}

export interface BindGroup {
  label?: string;
  entries: BindGroupEntry[];
}

export interface PanelBindings {
  camera: CameraUniform;
  panel: PanelUniform;
  model: ModelUniform;
}

export interface TexturedBindings {
  camera: CameraUniform;
  texture: Sampler;
}

export interface GlyphBindings {
  camera: CameraUniform;
  atlas: Sampler;
  model: ModelUniform;
}

export interface VariantBindings {
  panel: PanelBindings;
  sprite: TexturedBindings;
  texture: TexturedBindings;
  glyph: GlyphBindings;
}

type ResourceMap = {
  [R in BindingResource as R["type"]]: R["value"];
};

type ResourceOf<T extends BindingResource["type"]> = ResourceMap[T];

function entry<T extends BindingResource["type"]>(
  variant: ShaderVariantName,
  groups: readonly (BindGroup | undefined)[],
  group: number,
  binding: number,
  type: T
): ResourceOf<T> {
  const found = groups[group]?.entries.find((e) => e.binding === binding);
  if (!found) {
    throw new Error(
      `Invalid bindings for ${variant}: group ${group} binding ${binding} (${type}) is missing`
    );
  }
  const resource = found.resource;
  if (!isResource(resource, type)) {
    throw new Error(
      `Invalid bindings for ${variant}: group ${group} binding ${binding} expects ${type}, got ${resource.type}`
    );
  }
  return resource.value;
}

function isResource<T extends BindingResource["type"]>(
  resource: BindingResource,
  type: T
): resource is Extract<BindingResource, { type: T }> & { value: ResourceOf<T> } {
  return resource.type === type;
}

function checkMatrix(variant: ShaderVariantName, name: string, m: Mat4): void {
  if (m.length !== 16) {
    throw new Error(`Invalid bindings for ${variant}: ${name} must have 16 components, got ${m.length}`);
  }
}

function checkVector(
  variant: ShaderVariantName,
  name: string,
  v: readonly number[],
  length: number
): void {
  if (v.length !== length || !isFiniteVector(v)) {
    throw new Error(`Invalid bindings for ${variant}: ${name} must be ${length} finite numbers`);
  }
}

function camera(variant: ShaderVariantName, groups: readonly (BindGroup | undefined)[]): CameraUniform {
  const value = entry(variant, groups, 0, 0, "camera");
  checkMatrix(variant, "camera.projection", value.projection);
  checkVector(variant, "camera.position", value.position, 3);
  return value;
}

function model(
  variant: ShaderVariantName,
  groups: readonly (BindGroup | undefined)[],
  group: number
): ModelUniform {
  const value = entry(variant, groups, group, 0, "model");
  checkMatrix(variant, "model.transform", value.transform);
  return value;
}

function texture(
  variant: ShaderVariantName,
  groups: readonly (BindGroup | undefined)[],
  group: number
): Sampler {
  const tex = entry(variant, groups, group, 0, "texture");
  const descriptor = entry(variant, groups, group, 1, "sampler");
  return createSampler(tex, descriptor);
}

type Resolvers = {
  [V in ShaderVariantName]: (groups: readonly (BindGroup | undefined)[]) => VariantBindings[V];
};

const RESOLVERS: Resolvers = {
  panel: (groups) => {
    const panel = entry("panel", groups, 1, 0, "panel");
    checkVector("panel", "panel.size", panel.size, 4);
    checkVector("panel", "panel.menuColor", panel.menuColor, 4);
    checkVector("panel", "panel.selectionColor", panel.selectionColor, 4);
    checkVector("panel", "panel.selectionRangeY", panel.selectionRangeY, 4);
    return { camera: camera("panel", groups), panel, model: model("panel", groups, 2) };
  },
  sprite: (groups) => ({
    camera: camera("sprite", groups),
    texture: texture("sprite", groups, 1),
  }),
  texture: (groups) => ({
    camera: camera("texture", groups),
    texture: texture("texture", groups, 1),
  }),
  glyph: (groups) => ({
    camera: camera("glyph", groups),
    atlas: texture("glyph", groups, 1),
    model: model("glyph", groups, 2),
  }),
};

/**
 * Check a host's bind groups against a variant's layout and resolve them
 * into the typed bindings the program reads. Runs before submission; the
 * programs themselves never see a malformed binding.
 *
 * @throws on a missing group or entry, a resource of the wrong kind, or a
 *   uniform with the wrong arity
 */
export function validateBindings<V extends ShaderVariantName>(
  variant: V,
  groups: readonly (BindGroup | undefined)[]
): VariantBindings[V] {
  const expected = VARIANTS[variant].bindGroups.length;
  if (groups.length > expected) {
    throw new Error(
      `Invalid bindings for ${variant}: expected ${expected} bind groups, got ${groups.length}`
    );
  }
  const resolve: Resolvers[V] = RESOLVERS[variant];
  return resolve(groups);
}

// Convenience constructors for the common group shapes

export function cameraGroup(value: CameraUniform): BindGroup {
  return { label: "Camera", entries: [{ binding: 0, resource: { type: "camera", value } }] };
}

export function panelGroup(value: PanelUniform): BindGroup {
  return { label: "Ui", entries: [{ binding: 0, resource: { type: "panel", value } }] };
}

export function modelGroup(value: ModelUniform): BindGroup {
  return { label: "Position", entries: [{ binding: 0, resource: { type: "model", value } }] };
}

export function textureGroup(value: Texture2D, sampler: SamplerDescriptor = {}): BindGroup {
  return {
    label: "Texture",
    entries: [
      { binding: 0, resource: { type: "texture", value } },
      { binding: 1, resource: { type: "sampler", value: sampler } },
    ],
  };
}
