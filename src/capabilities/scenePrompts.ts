import { z } from "zod";

import type { SceneReader } from "../host/sceneHost.js";
import { definePrompt, type PromptDescriptor } from "../registry/capabilities.js";

export function createScenePrompts(scene: SceneReader): PromptDescriptor[] {
  return [
    definePrompt({
      name: "explain_scene",
      title: "Explain scene",
      description: "Ask the assistant to explain what the current scene contains.",
      argsSchema: {
        focus: z.string().optional().describe("Object name or topic to focus the explanation on"),
      },
      render: ({ focus }) => {
        const objects = scene.list();
        const inventory =
          objects.length === 0
            ? "The scene is empty."
            : `It contains ${objects.length} object(s): ${objects.map((object) => `${object.name} (${object.type})`).join(", ")}.`;
        const focusLine = focus ? `\nFocus on: ${focus}.` : "";
        return [
          {
            role: "user",
            content: {
              type: "text",
              text: `Explain the scene "${scene.sceneName}". ${inventory}${focusLine}`,
            },
          },
        ];
      },
    }),
  ];
}
