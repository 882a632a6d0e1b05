import { Script, createContext } from "node:vm";

import type { HostExecutionContext } from "./types.js";

/** Object families known to the demo scene. */
export type SceneObjectType = "MESH" | "CAMERA" | "LIGHT";

export type Vector3 = readonly [number, number, number];

/** Plain snapshot of a scene object handed to scripts and resources. */
export interface SceneObject {
  readonly name: string;
  readonly type: SceneObjectType;
  /** Mesh primitive the object was created from. */
  readonly primitive: string | null;
  readonly location: Vector3;
  readonly selected: boolean;
}

export interface AddObjectOptions {
  readonly name?: string;
  readonly location?: Vector3;
}

/** Read side of the scene, used by resources and prompts. */
export interface SceneReader {
  readonly sceneName: string;
  readonly activeObject: SceneObject | null;
  list(): SceneObject[];
  get(name: string): SceneObject | null;
}

const ORIGIN: Vector3 = [0, 0, 0];

interface MutableSceneObject {
  name: string;
  type: SceneObjectType;
  primitive: string | null;
  location: Vector3;
  selected: boolean;
}

function snapshot(object: MutableSceneObject): SceneObject {
  return {
    name: object.name,
    type: object.type,
    primitive: object.primitive,
    location: [object.location[0], object.location[1], object.location[2]],
    selected: object.selected,
  };
}

/**
 * Minimal scene graph owned by the host. It is only ever touched from inside a
 * host tick; scripts reach it through the `scene` global.
 */
export class SceneModel implements SceneReader {
  readonly sceneName: string;
  private readonly objects = new Map<string, MutableSceneObject>();
  private activeName: string | null = null;

  constructor(sceneName = "Scene") {
    this.sceneName = sceneName;
  }

  get activeObject(): SceneObject | null {
    const active = this.activeName ? this.objects.get(this.activeName) : undefined;
    return active ? snapshot(active) : null;
  }

  addCube(options: AddObjectOptions = {}): SceneObject {
    return this.add("MESH", "cube", options.name ?? "Cube", options.location);
  }

  addSphere(options: AddObjectOptions = {}): SceneObject {
    return this.add("MESH", "uv_sphere", options.name ?? "Sphere", options.location);
  }

  addCamera(options: AddObjectOptions = {}): SceneObject {
    return this.add("CAMERA", null, options.name ?? "Camera", options.location);
  }

  addLight(options: AddObjectOptions = {}): SceneObject {
    return this.add("LIGHT", null, options.name ?? "Light", options.location);
  }

  remove(name: string): boolean {
    const removed = this.objects.delete(name);
    if (removed && this.activeName === name) {
      this.activeName = null;
    }
    return removed;
  }

  /** Selects a single object and makes it active. Throws on unknown names. */
  select(name: string): SceneObject {
    const target = this.objects.get(name);
    if (!target) {
      throw new Error(`Object '${name}' not found`);
    }
    for (const object of this.objects.values()) {
      object.selected = object === target;
    }
    this.activeName = name;
    return snapshot(target);
  }

  get(name: string): SceneObject | null {
    const object = this.objects.get(name);
    return object ? snapshot(object) : null;
  }

  list(): SceneObject[] {
    return [...this.objects.values()].map(snapshot);
  }

  clear(): void {
    this.objects.clear();
    this.activeName = null;
  }

  private add(type: SceneObjectType, primitive: string | null, baseName: string, location?: Vector3): SceneObject {
    const name = this.uniqueName(baseName);
    for (const object of this.objects.values()) {
      object.selected = false;
    }
    const object: MutableSceneObject = { name, type, primitive, location: location ?? ORIGIN, selected: true };
    this.objects.set(name, object);
    this.activeName = name;
    return snapshot(object);
  }

  /** `Cube`, then `Cube.001`, `Cube.002`… reusing the first free suffix. */
  private uniqueName(baseName: string): string {
    if (!this.objects.has(baseName)) {
      return baseName;
    }
    for (let suffix = 1; ; suffix += 1) {
      const candidate = `${baseName}.${String(suffix).padStart(3, "0")}`;
      if (!this.objects.has(candidate)) {
        return candidate;
      }
    }
  }
}

/** Evaluates source text on the host with the host API in scope. */
export interface CodeEvaluator {
  evaluate(code: string, context: HostExecutionContext): unknown;
}

/**
 * In-process host. Each evaluation gets a fresh `node:vm` global exposing
 * `scene`, `print` and a `console` whose output lands in the job capture;
 * the scene itself persists across evaluations.
 */
export class SceneHost implements CodeEvaluator {
  readonly scene: SceneModel;

  constructor(scene: SceneModel = new SceneModel()) {
    this.scene = scene;
  }

  /**
   * Runs the code synchronously and returns the completion value of its last
   * statement. Syntax and runtime errors propagate to the caller.
   */
  evaluate(code: string, context: HostExecutionContext): unknown {
    const script = new Script(code, { filename: `${context.capability.name}.js` });
    const print = (...values: unknown[]): void => context.print(...values);
    const sandbox = createContext({
      scene: this.scene,
      print,
      console: { log: print, info: print, warn: print, error: print, debug: print },
    });
    return script.runInContext(sandbox);
  }
}
