import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../../src/app";
import { SECRET_HEADER } from "../../src/modules/telegram/telegram.routes";
import { createHarness, QUESTION_BLOCK } from "../fakes/harness";

async function setup() {
  const harness = await createHarness();
  const app = createApp(harness.services, { corsOrigin: "http://localhost:3000", webhookSecret: "test-secret" });
  return { ...harness, app };
}

describe("HTTP API", () => {
  it("reports health", async () => {
    const { app } = await setup();
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it("dispatches a quiz without leaking the answer", async () => {
    const { app, services } = await setup();
    await services.questions.importText(QUESTION_BLOCK);

    const res = await request(app).post("/v1/quiz/dispatch").send({ chatId: -100, isGroup: true });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      question: { id: 1, question: "Which organ produces insulin?", options: ["Liver", "Pancreas", "Spleen", "Kidney"] }
    });

    const empty = await request(app).post("/v1/quiz/dispatch").send({ chatId: -100, isGroup: true });
    expect(empty.body).toEqual({ question: null });
  });

  it("validates dispatch requests", async () => {
    const { app } = await setup();
    const res = await request(app).post("/v1/quiz/dispatch").send({ chatId: "abc" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid request");
    expect(Object.keys(res.body.details).sort()).toEqual(["chatId", "isGroup"]);
  });

  it("records answer events", async () => {
    const { app, services } = await setup();
    await services.questions.importText(QUESTION_BLOCK);
    await services.quiz.dispatchQuiz({ chatId: -100, isGroup: true });

    const first = await request(app).post("/v1/polls/answers").send({ pollId: "poll-1", userId: 5, optionIds: [1] });
    const again = await request(app).post("/v1/polls/answers").send({ pollId: "poll-1", userId: 5, optionIds: [1] });
    const unknown = await request(app).post("/v1/polls/answers").send({ pollId: "poll-9", userId: 5, optionIds: [1] });

    expect(first.body).toEqual({ status: "recorded", correct: true, scoreDelta: 4, totalScore: 4 });
    expect(again.body).toEqual({ status: "duplicate" });
    expect(unknown.body).toEqual({ status: "ignored" });
  });

  it("serves leaderboards by scope", async () => {
    const { app, services } = await setup();
    await services.scoring.recordAnswer({ userId: 5, groupId: -1, isCorrect: true, username: "asha" });
    await services.scoring.recordAnswer({ userId: 6, groupId: null, isCorrect: true });

    const global = await request(app).get("/v1/leaderboard").query({ limit: 5 });
    expect(global.status).toBe(200);
    expect(global.body.items.map((i: { displayName: string }) => i.displayName)).toEqual(["@asha", "Participant 6"]);

    const group = await request(app).get("/v1/leaderboard").query({ scope: "group", groupId: -1 });
    expect(group.body).toEqual({
      scope: "group",
      items: [{ rank: 1, userId: 5, displayName: "@asha", attempted: 1, correct: 1, score: 4 }]
    });
  });

  it("rejects bad leaderboard queries", async () => {
    const { app } = await setup();
    expect((await request(app).get("/v1/leaderboard").query({ limit: 0 })).status).toBe(400);
    expect((await request(app).get("/v1/leaderboard").query({ limit: 101 })).status).toBe(400);

    const missingGroup = await request(app).get("/v1/leaderboard").query({ scope: "group" });
    expect(missingGroup.status).toBe(400);
    expect(missingGroup.body.details.groupId).toEqual(["groupId is required for the group scope"]);
  });

  it("returns stats or 404", async () => {
    const { app, services } = await setup();
    const missing = await request(app).get("/v1/stats/5");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "No statistics yet" });

    await services.scoring.recordAnswer({ userId: 5, groupId: -1, isCorrect: true });
    const res = await request(app).get("/v1/stats/5").query({ groupId: -1 });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ xp: 4, globalRank: 1, groupRank: 1, title: "Medical Student" });
  });

  it("exposes current settings", async () => {
    const { app } = await setup();
    const res = await request(app).get("/v1/settings");
    expect(res.body).toEqual({
      footerText: "NEETIQBot",
      footerEnabled: true,
      autoquizEnabled: false,
      autoquizIntervalMinutes: 30
    });
  });

  it("checks the webhook secret and handles updates", async () => {
    const { app, state } = await setup();
    const update = {
      update_id: 1,
      message: { message_id: 1, chat: { id: -7, type: "group", title: "G" }, from: { id: 3, first_name: "Li" }, text: "hi" }
    };

    const denied = await request(app).post("/v1/telegram/webhook").send(update);
    expect(denied.status).toBe(401);
    expect(state.chats.size).toBe(0);

    const ok = await request(app).post("/v1/telegram/webhook").set(SECRET_HEADER, "test-secret").send(update);
    expect(ok.status).toBe(200);
    expect(ok.body).toEqual({ ok: true });
    expect(state.chats.get(-7)?.title).toBe("G");
  });

  it("answers unknown routes and malformed JSON", async () => {
    const { app } = await setup();
    expect((await request(app).get("/v1/nothing")).status).toBe(404);

    const res = await request(app).post("/v1/polls/answers").set("content-type", "application/json").send("{oops");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed JSON body" });
  });
});
