import { describe, it } from "mocha";
import { expect } from "chai";

import { SceneHost, SceneModel } from "../src/host/sceneHost.js";
import type { HostExecutionContext } from "../src/host/types.js";

function recordingContext() {
  const printed: unknown[][] = [];
  const context: HostExecutionContext = {
    jobId: "job-1",
    capability: { kind: "tool", name: "run_code" },
    print: (...values) => {
      printed.push(values);
    },
  };
  return { context, printed };
}

describe("scene model", () => {
  it("names duplicates with the first free numeric suffix", () => {
    const scene = new SceneModel();

    expect(scene.addCube().name).to.equal("Cube");
    expect(scene.addCube().name).to.equal("Cube.001");
    expect(scene.addCube().name).to.equal("Cube.002");
    scene.remove("Cube.001");
    expect(scene.addCube().name).to.equal("Cube.001");
  });

  it("selects and activates the last added object", () => {
    const scene = new SceneModel();
    scene.addCube();
    scene.addLight({ location: [0, 0, 5] });

    expect(scene.activeObject).to.deep.equal({
      name: "Light",
      type: "LIGHT",
      primitive: null,
      location: [0, 0, 5],
      selected: true,
    });
    expect(scene.get("Cube")?.selected).to.equal(false);
  });

  it("moves the selection explicitly and rejects unknown names", () => {
    const scene = new SceneModel();
    scene.addSphere();
    scene.addCamera();

    scene.select("Sphere");

    expect(scene.activeObject?.name).to.equal("Sphere");
    expect(scene.list().map((object) => object.selected)).to.deep.equal([true, false]);
    expect(() => scene.select("Ghost")).to.throw("Object 'Ghost' not found");
  });

  it("clears the active object when it is removed", () => {
    const scene = new SceneModel();
    scene.addCube();

    expect(scene.remove("Cube")).to.equal(true);
    expect(scene.activeObject).to.equal(null);
    expect(scene.remove("Cube")).to.equal(false);
  });
});

describe("scene host", () => {
  it("returns the completion value of the last statement", () => {
    const host = new SceneHost();
    const { context } = recordingContext();

    expect(host.evaluate("const n = 20; n + 1", context)).to.equal(21);
  });

  it("routes print and console output through the job context", () => {
    const host = new SceneHost();
    const { context, printed } = recordingContext();

    host.evaluate('print("Added cube:", scene.addCube().name); console.log("done")', context);

    expect(printed).to.deep.equal([["Added cube:", "Cube"], ["done"]]);
  });

  it("keeps the scene but not the globals between evaluations", () => {
    const host = new SceneHost();
    const { context } = recordingContext();

    host.evaluate("var leaked = 1; scene.addCube()", context);

    expect(host.evaluate("typeof leaked", context)).to.equal("undefined");
    expect(host.evaluate("scene.addCube().name", context)).to.equal("Cube.001");
  });

  it("propagates syntax and runtime errors", () => {
    const host = new SceneHost();
    const { context } = recordingContext();

    expect(() => host.evaluate("let = ;", context)).to.throw(SyntaxError);
    expect(() => host.evaluate('scene.select("Ghost")', context)).to.throw("Object 'Ghost' not found");
  });
});
