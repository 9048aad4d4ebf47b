import { SysmlApiClient } from "../api/client.js";
import {
  createFakeServer,
  el,
  FAKE_BASE_URL,
  FAKE_PASSWORD,
  FAKE_USERNAME,
  type FakeModel,
  type FakeServer,
} from "../api/fake-server.js";

/**
 * Vehicle model shared by explorer and generator tests.
 *
 *   root (Namespace)
 *   └── pkg  Package "Vehicle"   members: m1 m2 m3 m4, features: m2
 *       ├── m1 PartDefinition "Motor"    features: f1
 *       │   └── f1 AttributeUsage "power"
 *       ├── m2 PartDefinition "Battery"
 *       ├── m3 (answers 500)
 *       └── m4 FeatureTyping (not displayable)
 */
export function vehicleModel(): FakeModel {
  return {
    projects: [
      {
        "@id": "p1",
        name: "Vehicle",
        projectUsages: [
          { usedProject: { "@id": "lib", name: "Library" }, usedCommit: { "@id": "lc1" } },
          { usedProject: { "@id": "gone" }, usedCommit: { "@id": "gc1" } },
          { usedProject: { "@id": "half" } },
        ],
      },
      { "@id": "lib", name: "Library" },
    ],
    commits: {
      p1: [
        { "@id": "c1", created: "2026-01-01T00:00:00Z" },
        { "@id": "c2", created: "2026-02-01T00:00:00Z" },
      ],
      lib: [{ "@id": "lc1" }],
    },
    roots: {
      c2: [el("root", "Namespace", undefined, { members: ["pkg"] })],
      lc1: [el("libroot", "Namespace", "ScalarValues")],
    },
    elements: {
      c2: [
        el("root", "Namespace", undefined, { members: ["pkg"] }),
        el("pkg", "Package", "Vehicle", { members: ["m1", "m2", "m3", "m4"], features: ["m2"] }),
        el("m1", "PartDefinition", "Motor", { features: ["f1"] }),
        el("m2", "PartDefinition", "Battery"),
        el("m4", "FeatureTyping"),
        el("f1", "AttributeUsage", "power"),
      ],
    },
    failingElements: ["m3"],
  };
}

export function vehicleClient(model: FakeModel = vehicleModel()): { client: SysmlApiClient; server: FakeServer } {
  const server = createFakeServer(model);
  const client = new SysmlApiClient({
    baseUrl: FAKE_BASE_URL,
    username: FAKE_USERNAME,
    password: FAKE_PASSWORD,
    fetch: server.fetch,
  });
  return { client, server };
}
