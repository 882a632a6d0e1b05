import { describe, it } from "mocha";
import { expect } from "chai";

import { ExecutionBroker } from "../src/broker/executionBroker.js";
import { JobTable } from "../src/broker/jobTable.js";
import { TickAdapter } from "../src/broker/tickAdapter.js";
import { createRunCodeTool } from "../src/capabilities/runCode.js";
import { createScenePrompts } from "../src/capabilities/scenePrompts.js";
import { createSceneResources, renderActiveScene, renderSceneObjects } from "../src/capabilities/sceneResources.js";
import { SceneHost, SceneModel } from "../src/host/sceneHost.js";
import { CapabilityRegistry } from "../src/registry/capabilityRegistry.js";
import { ProtocolRouter } from "../src/router/protocolRouter.js";
import { ManualTickScheduler } from "./helpers/tickScheduler.js";

function createStack() {
  const host = new SceneHost();
  const registry = new CapabilityRegistry();
  registry.register(createRunCodeTool(host));
  for (const descriptor of [...createSceneResources(host.scene), ...createScenePrompts(host.scene)]) {
    registry.register(descriptor);
  }
  const table = new JobTable({ capacity: 10 });
  const adapter = new TickAdapter({ table });
  const scheduler = new ManualTickScheduler();
  adapter.attach(scheduler);
  const broker = new ExecutionBroker({ registry, table, scheduler: adapter, defaultTimeoutMs: 1_000 });
  const router = new ProtocolRouter({ registry, broker });
  return { host, router, scheduler };
}

async function request(stack: ReturnType<typeof createStack>, method: string, params: unknown) {
  const pending = stack.router.dispatch({ jsonrpc: "2.0", id: 1, method, params });
  stack.scheduler.runTick();
  return pending;
}

describe("scene resources", () => {
  it("summarises the active scene", () => {
    const scene = new SceneModel();
    scene.addCube();
    scene.addCamera({ location: [1, 2, 3] });

    expect(renderActiveScene(scene)).to.equal(
      "# Current Scene: Scene\n\n" +
        "- Objects: 2\n" +
        "- Active Object: Camera\n" +
        "- Selected: Camera\n" +
        "\n## Object Types\n\n" +
        "- CAMERA: 1\n" +
        "- MESH: 1\n",
    );
  });

  it("summarises an empty scene", () => {
    expect(renderActiveScene(new SceneModel())).to.equal(
      "# Current Scene: Scene\n\n- Objects: 0\n- Active Object: none\n- Selected: none\n",
    );
  });

  it("tabulates objects with rounded locations", () => {
    const scene = new SceneModel();
    scene.addCube({ location: [1.23456, 0, -2] });
    scene.addSphere();

    expect(renderSceneObjects(scene)).to.equal(
      "# Objects (2 total)\n\n" +
        "| Name | Type | Location | Selected |\n|---|---|---|---|\n" +
        "| Cube | MESH | [1.235, 0, -2] | no |\n" +
        "| Sphere | MESH | [0, 0, 0] | yes |\n",
    );
    expect(renderSceneObjects(new SceneModel())).to.equal("# Objects (0 total)\n\nScene is empty.\n");
  });
});

describe("scene prompts", () => {
  it("describes the scene inventory and the optional focus", () => {
    const scene = new SceneModel();
    const [prompt] = createScenePrompts(scene);
    if (!prompt) {
      throw new Error("explain_scene prompt missing");
    }
    const context = { jobId: "job-1", capability: { kind: "prompt", name: "explain_scene" }, print: () => undefined } as const;

    const empty = prompt.bind({});
    expect(empty.ok && empty.task(context)).to.deep.equal([
      { role: "user", content: { type: "text", text: 'Explain the scene "Scene". The scene is empty.' } },
    ]);

    scene.addCube();
    const focused = prompt.bind({ focus: "Cube" });
    expect(focused.ok && focused.task(context)).to.deep.equal([
      {
        role: "user",
        content: { type: "text", text: 'Explain the scene "Scene". It contains 1 object(s): Cube (MESH).\nFocus on: Cube.' },
      },
    ]);
  });
});

describe("run_code through the router", () => {
  it("adds objects to the shared scene and returns the printed output", async () => {
    const stack = createStack();

    const first = await request(stack, "tools/call", {
      name: "run_code",
      arguments: { code: 'const cube = scene.addCube(); print("Added cube:", cube.name);' },
    });
    const second = await request(stack, "tools/call", {
      name: "run_code",
      arguments: { code: 'print("Added cube:", scene.addCube().name);' },
    });

    expect(first?.result).to.deep.equal({ content: [{ type: "text", text: "Added cube: Cube\n" }], isError: false });
    expect(second?.result).to.deep.equal({
      content: [{ type: "text", text: "Added cube: Cube.001\n" }],
      isError: false,
    });
    expect(stack.host.scene.list()).to.have.length(2);
  });

  it("reports syntax errors as failed tool results", async () => {
    const stack = createStack();

    const response = await request(stack, "tools/call", { name: "run_code", arguments: { code: "let = ;" } });

    expect(response?.result).to.deep.include({ isError: true });
    const text = JSON.stringify(response?.result);
    expect(text).to.include("Error (ExecutionError): SyntaxError:");
  });

  it("refuses empty code before scheduling a job", async () => {
    const stack = createStack();

    const response = await request(stack, "tools/call", { name: "run_code", arguments: { code: "" } });

    expect(response?.result).to.deep.equal({
      content: [{ type: "text", text: "Error (InvalidPayload): code: code must not be empty" }],
      isError: true,
    });
    expect(stack.scheduler.requests).to.equal(0);
  });

  it("serves the scene resources after code changed the scene", async () => {
    const stack = createStack();
    await request(stack, "tools/call", { name: "run_code", arguments: { code: "scene.addLight()" } });

    const response = await request(stack, "resources/read", { uri: "scene://active" });

    expect(response?.result).to.deep.equal({
      contents: [
        {
          uri: "scene://active",
          mimeType: "text/markdown",
          text:
            "# Current Scene: Scene\n\n- Objects: 1\n- Active Object: Light\n- Selected: Light\n" +
            "\n## Object Types\n\n- LIGHT: 1\n",
        },
      ],
    });
  });
});
