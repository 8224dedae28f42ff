import {
  abilities,
  actions,
  addSanctumAccess,
  cost,
  faceUpInPlay,
  isInnerRoom,
  lookup,
  matchingRaid,
  mutations,
  onActivated,
  oncePerTurn,
  onRaidAccessStart,
  onRaidSuccess,
  saveRaidId,
  startRaid,
  type CardDefinition,
  type RoomId,
} from "@ravenhold/engine";

export function lodestarPrism(): CardDefinition {
  return {
    name: "Lodestar Prism",
    cost: cost(1),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [abilities.storeManaOnPlay(12), abilities.activatedTakeMana(2, actions(1))],
    stats: {},
  };
}

export function sanctumKey(): CardDefinition {
  return {
    name: "Sanctum Key",
    cost: cost(2),
    cardType: "artifact",
    side: "champion",
    rarity: "common",
    abilities: [
      {
        text: "The first time each turn you access the Sanctum, access 1 additional card.",
        abilityType: { type: "standard" },
        delegates: [
          onRaidAccessStart(
            (game, scope) => faceUpInPlay(game, scope) && lookup.activeRaid(game.state).target === "sanctum",
            (game, scope, raidId) => {
              oncePerTurn(game, scope, raidId, saveRaidId);
            },
          ),
          addSanctumAccess(1, matchingRaid),
        ],
      },
    ],
    stats: {},
  };
}

export function gatheringJar(): CardDefinition {
  return {
    name: "Gathering Jar",
    cost: cost(3),
    cardType: "artifact",
    side: "champion",
    rarity: "uncommon",
    abilities: [
      {
        text: "Successful raid: Store 1 mana.",
        abilityType: { type: "standard" },
        delegates: [
          onRaidSuccess(faceUpInPlay, (game, scope) => {
            mutations.addStoredMana(game, scope.cardId, 1);
          }),
        ],
      },
      {
        text: "Store 1 mana, then take all stored mana.",
        abilityType: { type: "activated", cost: actions(1) },
        delegates: [
          onActivated((game, scope) => {
            const stored = mutations.addStoredMana(game, scope.cardId, 1);
            mutations.takeStoredMana(game, scope.cardId, stored);
          }),
        ],
      },
    ],
    stats: {},
  };
}

/**
 * Raid an inner room not yet raided with this card this turn; a successful
 * raid takes 3 of the stored mana.
 */
export function starlitGate(): CardDefinition {
  return {
    name: "Starlit Gate",
    cost: cost(5),
    cardType: "artifact",
    side: "champion",
    rarity: "rare",
    abilities: [
      abilities.storeManaOnPlay(12),
      {
        text: "Raid an inner room you have not raided this turn. If successful, take 3 mana.",
        abilityType: {
          type: "activated",
          cost: actions(1),
          target: (game, abilityId, room) =>
            isInnerRoom(room) &&
            lookup.abilityState(game.state, abilityId)?.roomTurns?.[room] !== game.state.turn.turnNumber,
        },
        delegates: [
          onActivated((game, scope, activated) => {
            const room = activated.room;
            if (room === undefined) return;
            const roomTurns: Partial<Record<RoomId, number>> = {
              ...lookup.abilityState(game.state, scope.abilityId)?.roomTurns,
            };
            roomTurns[room] = game.state.turn.turnNumber;
            // the raid about to start gets the next id
            mutations.setAbilityState(game, scope.abilityId, { raidId: game.state.nextRaidId, roomTurns });
            startRaid(game, room);
          }),
          onRaidSuccess(matchingRaid, (game, scope) => {
            mutations.takeStoredMana(game, scope.cardId, 3);
          }),
        ],
      },
    ],
    stats: {},
  };
}
