import { describe, expect, it } from "vitest";
import { EntityClassifier } from "../src/classifier/entity-classifier";
import { UNKNOWN_ZONE } from "../src/constants";
import { EntityClass } from "../src/types";
import { FakeClient, createNpc, createPlayer, silentLogger } from "./fakes";

const createClassifier = (client: FakeClient, zone = "West Ronfaure") =>
  new EntityClassifier(client, { zone, logger: silentLogger });

describe("EntityClassifier", () => {
  it("classifies non-NPCs as players", () => {
    const client = new FakeClient().addEntity(createPlayer(10));

    expect(createClassifier(client).classify(10)).toBe(EntityClass.Player);
  });

  it("classifies party NPCs as trusts and other NPCs as mobs", () => {
    const client = new FakeClient()
      .addPartyMember(createNpc(20, "Zeid II", { modelId: 3010 }))
      .addEntity(createNpc(30, "Orcish Fighter"));
    const classifier = createClassifier(client);

    expect(classifier.resolve(20)).toEqual({
      entityClass: EntityClass.Trust,
      registration: {
        id: 20,
        index: undefined,
        name: "Zeid II",
        modelId: 3010,
        zone: "West Ronfaure",
      },
    });
    expect(classifier.classify(30)).toBe(EntityClass.Mob);
  });

  it("does not cache unknown entities", () => {
    const client = new FakeClient();
    const classifier = createClassifier(client);

    expect(classifier.classify(40)).toBe(EntityClass.Unknown);

    client.addEntity(createNpc(40, "Wild Rabbit"));
    expect(classifier.classify(40)).toBe(EntityClass.Mob);
  });

  it("keeps a classification sticky until the zone changes", () => {
    const client = new FakeClient().addEntity(createNpc(50, "Goblin Thug"));
    const classifier = createClassifier(client);
    expect(classifier.classify(50)).toBe(EntityClass.Mob);

    client.addPartyMember(createNpc(50, "Goblin Thug"));
    expect(classifier.classify(50)).toBe(EntityClass.Mob);

    classifier.onZoneChange("East Ronfaure");
    expect(classifier.currentZone).toBe("East Ronfaure");
    expect(classifier.classify(50)).toBe(EntityClass.Trust);
    expect(classifier.getRegistration(50)?.zone).toBe("East Ronfaure");
  });

  it("falls back to placeholder names and zone", () => {
    const client = new FakeClient().addEntity(createNpc(60, ""));
    const classifier = new EntityClassifier(client, { logger: silentLogger });

    expect(classifier.getRegistration(60)).toBeUndefined();
    classifier.classify(60);
    expect(classifier.getRegistration(60)).toMatchObject({
      name: "Unknown",
      zone: UNKNOWN_ZONE,
    });
  });

  it("registers party trusts during a scan and skips the player", () => {
    const client = new FakeClient()
      .addPartyMember(createPlayer(1))
      .addPartyMember(createNpc(21, "Shantotto II"))
      .addPartyMember(createNpc(22, "Ayame"));
    const classifier = createClassifier(client);

    const first = classifier.scanParty();

    expect(first.map((registration) => registration.name)).toEqual(["Shantotto II", "Ayame"]);
    expect(classifier.classify(1)).toBe(EntityClass.Player);
    expect(classifier.scanParty()).toEqual([]);
    expect(classifier.activeTrusts()).toHaveLength(2);
  });

  it("clears all classifications", () => {
    const client = new FakeClient().addPartyMember(createNpc(21, "Shantotto II"));
    const classifier = createClassifier(client);
    classifier.scanParty();

    classifier.clear();

    expect(classifier.activeTrusts()).toEqual([]);
  });
});
