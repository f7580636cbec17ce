import { describe, it, expect, beforeEach } from "vitest";
import type { WorldDefinition } from "@lantern/schemas";
import { EngineFailureError } from "@lantern/schemas";
import { ScriptedEngine, loadWorld, checkReferences } from "./scripted-engine.js";

const world = (): WorldDefinition => ({
  title: "Test Cave",
  start: "Entrance",
  final_room: "Exit",
  final_points: 20,
  rooms: {
    Entrance: { description: "A damp entrance.", exits: { north: "Hall" } },
    Hall: { description: "A long hall.", exits: { south: "Entrance", up: "Exit" } },
    Exit: { description: "Daylight.", exits: {} },
  },
  items: [
    { name: "rusty key", location: "Entrance", points: 5 },
    { name: "brass lamp", aliases: ["lantern"], location: "Hall" },
    { name: "stone altar", location: "Hall", fixed: true },
  ],
});

describe("ScriptedEngine", () => {
  let engine: ScriptedEngine;

  beforeEach(async () => {
    engine = new ScriptedEngine(world());
    await engine.reset();
  });

  it("starts in the start room with nothing carried", async () => {
    expect(await engine.reset()).toEqual({
      observation: "Entrance\nA damp entrance.\nThere is a rusty key here.",
      score: 0,
      moves: 0,
      reward: 0,
      done: false,
      inventory: [],
    });
  });

  it("moves through exits and describes the new room", async () => {
    const t = await engine.step("north");
    expect(t.observation).toBe("Hall\nA long hall.\nThere is a brass lamp here.");
    expect(t.moves).toBe(1);
    expect((await engine.step("s")).observation).toBe("Entrance\nA damp entrance.\nThere is a rusty key here.");
    expect((await engine.step("go north")).observation.split("\n")[0]).toBe("Hall");
  });

  it("refuses exits that do not exist", async () => {
    expect((await engine.step("west")).observation).toBe("You can't go that way.");
  });

  it("awards points the first time a treasure is taken", async () => {
    const taken = await engine.step("get key");
    expect(taken).toMatchObject({ observation: "Taken.", score: 5, reward: 5 });
    expect(taken.inventory).toEqual(["Obj2: rusty key Parent1 Sibling0 Child0"]);

    expect((await engine.step("take key")).observation).toBe("You already have that!");
    await engine.step("drop key");
    const again = await engine.step("take rusty key");
    expect(again).toMatchObject({ score: 5, reward: 0 });
  });

  it("finds items by alias and refuses fixed scenery", async () => {
    await engine.step("north");
    const lamp = await engine.step("take lantern");
    expect(lamp.inventory).toEqual(["Obj3: brass lamp Parent1 Sibling0 Child0"]);
    expect((await engine.step("take altar")).observation).toBe("It is securely anchored.");
    expect((await engine.step("take sword")).observation).toBe("You can't see any such thing.");
  });

  it("lists carried items in world order", async () => {
    expect((await engine.step("i")).observation).toBe("You are empty-handed.");
    await engine.step("take key");
    await engine.step("north");
    await engine.step("take lamp");
    expect((await engine.step("inventory")).observation).toBe("You are carrying:\n  A rusty key\n  A brass lamp");
  });

  it("answers unknown verbs, waiting and score", async () => {
    expect((await engine.step("xyzzy")).observation).toBe('I don\'t know the word "xyzzy".');
    expect((await engine.step("z")).observation).toBe("Time passes...");
    expect((await engine.step("score")).observation).toBe("Your score is 0 (total of 25 points), in 3 moves.");
  });

  it("ends the game in the final room", async () => {
    await engine.step("take key");
    await engine.step("north");
    const won = await engine.step("up");
    expect(won).toMatchObject({ score: 25, reward: 20, done: true, moves: 3 });
    expect(won.observation).toBe("Exit\nDaylight.\n\n*** You have won ***");

    const after = await engine.step("look");
    expect(after).toMatchObject({ observation: "The game is over. Thanks for playing Test Cave.", moves: 3, done: true });
  });

  it("does not count a blank command as a move", async () => {
    expect(await engine.step("   ")).toMatchObject({ observation: "I beg your pardon?", moves: 0 });
  });

  it("lists exits, takeable items and the standing actions as valid actions", async () => {
    expect(await engine.getValidActions()).toEqual(["north", "take key", "look", "inventory"]);
    await engine.step("take key");
    await engine.step("north");
    expect(await engine.getValidActions()).toEqual(["south", "up", "drop key", "take lamp", "look", "inventory"]);
  });

  it("builds a sorted dictionary truncated to six letters", async () => {
    const dictionary = await engine.getDictionary();
    expect(dictionary).toEqual([...dictionary].sort());
    expect(dictionary).toContain("lanter");
    expect(dictionary).toContain("northe");
    expect(dictionary).not.toContain("lantern");
    expect(dictionary.every((w) => w.length <= 6)).toBe(true);
  });

  it("restores an independent snapshot", async () => {
    await engine.step("take key");
    const snapshot = await engine.getState();
    await engine.step("north");
    await engine.step("drop key");

    await engine.setState(snapshot);
    expect(await engine.getState()).toEqual(snapshot);
    expect((await engine.step("look")).observation).toBe("Entrance\nA damp entrance.");
    expect(snapshot.room).toBe("Entrance");
    expect(snapshot.moves).toBe(1);
  });

  it("rejects a snapshot from another world", async () => {
    const snapshot = { ...(await engine.getState()), room: "Attic" };
    await expect(engine.setState(snapshot)).rejects.toBeInstanceOf(EngineFailureError);
  });
});

describe("loadWorld", () => {
  it("loads the bundled world", async () => {
    const cellar = await loadWorld();
    expect(cellar.title).toBe("The Cellar");
    const engine = new ScriptedEngine(cellar);
    expect((await engine.reset()).observation.split("\n")[0]).toBe("Cellar");
  });

  it("reports a missing file", async () => {
    await expect(loadWorld("/nonexistent/world.json")).rejects.toThrow('Cannot read world file "/nonexistent/world.json"');
  });
});

describe("checkReferences", () => {
  it("accepts a consistent world", () => {
    expect(checkReferences(world())).toEqual([]);
  });

  it("names every dangling reference", () => {
    const broken = world();
    broken.start = "Lobby";
    broken.rooms.Entrance = { description: "A damp entrance.", exits: { north: "Nowhere" } };
    expect(checkReferences(broken)).toEqual([
      'start room "Lobby" does not exist',
      'exit north from "Entrance" leads to unknown room "Nowhere"',
    ]);
  });
});
