import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { createApp } from "../src/application/app";
import { createContainer } from "../src/config/container";

describe("App", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp(createContainer({ textClient: null }));
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Test server has no TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("debe responder el health check", async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe("ok");
    expect(body.objectives).toEqual({ total: 0, active: 0 });
  });

  it("debe devolver 404 para rutas desconocidas", async () => {
    const res = await fetch(`${baseUrl}/api/rituals`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Route not found" });
  });

  it("debe crear objetivos y rechazar duplicados", async () => {
    const created = await post("/api/objectives", {
      id: "look",
      kind: "immediate",
      options: { title: "Look around", requiredActions: ["look"] },
    });
    expect(created.status).toBe(201);
    const info = await created.json();
    expect(info.id).toBe("look");
    expect(info.title).toBe("Look around");
    expect(info.status).toBe("inactive");

    const duplicate = await post("/api/objectives", { id: "look", kind: "immediate" });
    expect(duplicate.status).toBe(409);
    expect((await duplicate.json()).code).toBe("duplicate_id");
  });

  it("debe crear objetivos desde plantillas", async () => {
    const res = await post("/api/objectives", {
      id: "library",
      template: "library_investigation",
    });

    expect(res.status).toBe(201);
    expect((await res.json()).title).toBe("Investigate the Library");
  });

  it("debe validar el cuerpo de creación", async () => {
    const both = await post("/api/objectives", { id: "x", kind: "immediate", template: "npc_interview" });
    const unknownKind = await post("/api/objectives", { id: "y", kind: "ritual_circle" });
    const unknownTemplate = await post("/api/objectives", { id: "z", template: "nowhere" });

    expect(both.status).toBe(400);
    expect((await both.json()).error).toBe("Invalid request body");
    expect(unknownKind.status).toBe(400);
    expect((await unknownKind.json()).code).toBe("unknown_type");
    expect(unknownTemplate.status).toBe(400);
    expect((await unknownTemplate.json()).code).toBe("unknown_template");
  });

  it("debe aplicar transiciones y rechazar las inválidas", async () => {
    await post("/api/objectives", { id: "door", kind: "immediate" });

    const suspendInactive = await post("/api/objectives/door/suspend", {});
    expect(suspendInactive.status).toBe(409);
    expect(await suspendInactive.json()).toEqual({
      error: "Transition suspend refused for objective door",
    });

    const activated = await post("/api/objectives/door/activate", {});
    expect(activated.status).toBe(200);
    expect((await activated.json()).status).toBe("active");

    const started = await post("/api/objectives/door/start", {});
    expect((await started.json()).status).toBe("in_progress");

    const unknown = await post("/api/objectives/door/banish", {});
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({ error: "Unknown transition: banish" });

    const missing = await post("/api/objectives/nobody/start", {});
    expect(missing.status).toBe(404);
  });

  it("debe ejecutar turnos del juego", async () => {
    await post("/api/objectives", {
      id: "listen",
      kind: "immediate",
      options: { requiredActions: ["listen"] },
    });

    const first = await post("/api/objectives/turn", { gameState: {} });
    expect(first.status).toBe(200);
    expect((await first.json()).report.activated).toContain("listen");

    const second = await post("/api/objectives/turn", {
      gameState: {},
      actionData: { actionType: "listen" },
    });
    expect((await second.json()).report.completed).toContain("listen");

    const objective = await fetch(`${baseUrl}/api/objectives/listen`);
    expect((await objective.json()).status).toBe("completed");
  });

  it("debe rechazar turnos con acciones inválidas", async () => {
    const res = await post("/api/objectives/turn", { actionData: { sanLoss: -3 } });

    expect(res.status).toBe(400);
  });

  it("debe implementar las sugerencias pedidas", async () => {
    const res = await post("/api/objectives/suggestions", {
      gameState: { tensionLevel: 3, storyPhase: "action" },
      implement: true,
    });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.suggestions.length).toBeGreaterThan(0);
    expect(body.implemented).toHaveLength(body.suggestions.length);
    expect(body.implemented[0]).toBe("ai_generated_0");

    const stats = await fetch(`${baseUrl}/api/objectives/statistics`);
    expect((await stats.json()).ai.implementedSuggestions).toBe(body.suggestions.length);
  });

  it("debe listar logros visibles y comprobar desbloqueos", async () => {
    const list = await fetch(`${baseUrl}/api/achievements`);
    expect((await list.json()).achievements).toHaveLength(10);

    const check = await post("/api/achievements/check", {
      playerStats: { cosmicKnowledgeCount: 1 },
    });
    const body = await check.json();
    expect(check.status).toBe(200);
    expect(body.unlocked).toHaveLength(1);
  });
});
