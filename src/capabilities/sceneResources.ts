import type { SceneObject, SceneReader } from "../host/sceneHost.js";
import { defineResource, type ResourceDescriptor } from "../registry/capabilities.js";

/** Objects listed in detail before the listing is cut short. */
export const MAX_LISTED_OBJECTS = 500;

function formatLocation(location: SceneObject["location"]): string {
  return `[${location.map((value) => Number(value.toFixed(3))).join(", ")}]`;
}

export function renderActiveScene(scene: SceneReader): string {
  const objects = scene.list();
  const active = scene.activeObject;
  const byType = new Map<string, number>();
  for (const object of objects) {
    byType.set(object.type, (byType.get(object.type) ?? 0) + 1);
  }

  let output = `# Current Scene: ${scene.sceneName}\n\n`;
  output += `- Objects: ${objects.length}\n`;
  output += `- Active Object: ${active ? active.name : "none"}\n`;
  output += `- Selected: ${objects.filter((object) => object.selected).map((object) => object.name).join(", ") || "none"}\n`;
  if (byType.size > 0) {
    output += "\n## Object Types\n\n";
    for (const type of [...byType.keys()].sort()) {
      output += `- ${type}: ${byType.get(type) ?? 0}\n`;
    }
  }
  return output;
}

export function renderSceneObjects(scene: SceneReader): string {
  const objects = scene.list();
  let output = `# Objects (${objects.length} total)\n\n`;
  if (objects.length === 0) {
    return `${output}Scene is empty.\n`;
  }
  const listed = objects.slice(0, MAX_LISTED_OBJECTS);
  output += "| Name | Type | Location | Selected |\n|---|---|---|---|\n";
  for (const object of listed) {
    output += `| ${object.name} | ${object.type} | ${formatLocation(object.location)} | ${object.selected ? "yes" : "no"} |\n`;
  }
  if (objects.length > listed.length) {
    output += `\n_${objects.length - listed.length} more objects not shown._\n`;
  }
  return output;
}

/** `scene://active` and `scene://objects`, both rendered as markdown on the host. */
export function createSceneResources(scene: SceneReader): ResourceDescriptor[] {
  return [
    defineResource({
      name: "active_scene",
      uri: "scene://active",
      description: "Summary of the active scene: object count, active object and selection.",
      read: () => renderActiveScene(scene),
    }),
    defineResource({
      name: "scene_objects",
      uri: "scene://objects",
      description: "Table of every object in the scene with its type and location.",
      read: () => renderSceneObjects(scene),
    }),
  ];
}
