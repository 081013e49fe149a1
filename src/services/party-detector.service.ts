import {
  PARTY_COLORS,
  PARTY_SYMBOL,
  PARTY_SYMBOL_WITH_SELF,
  type PartyColor,
} from '../constants/party-colors.js';
import { SteamIdService } from './steamid.service.js';
import type { RosterPlayer, SteamId32 } from '../types/models.js';

export type PartyMember = Pick<RosterPlayer, 'steamId32' | 'enrichment'>;

export interface PartyIndicator {
  symbol: typeof PARTY_SYMBOL | typeof PARTY_SYMBOL_WITH_SELF;
  color: PartyColor;
}

/**
 * Groups the players of the current match into parties: connected groups of
 * two or more players linked by Steam friendships.
 *
 * The graph and the party list are rebuilt from scratch on every refresh.
 */
export class PartyDetector {
  private nodeList: SteamId32[] = [];
  private nodeIndex = new Map<SteamId32, number>();
  private adjacency: Set<number>[] = [];
  private parties: SteamId32[][] = [];
  private partyOf = new Map<SteamId32, number>();

  clear() {
    this.nodeList = [];
    this.nodeIndex.clear();
    this.adjacency = [];
    this.parties = [];
    this.partyOf.clear();
  }

  /**
   * Rebuild the friendship graph for the given roster. A player without
   * enrichment data or a visible friends list simply contributes no edges.
   */
  rebuild(roster: Iterable<PartyMember>) {
    this.clear();

    const members = [...roster];
    for (const member of members) {
      if (!this.nodeIndex.has(member.steamId32)) {
        this.nodeIndex.set(member.steamId32, this.nodeList.length);
        this.nodeList.push(member.steamId32);
        this.adjacency.push(new Set());
      }
    }

    for (const member of members) {
      if (member.enrichment?.status !== 'ok') {
        continue;
      }
      const friends = member.enrichment.info.friends;
      if (!friends) {
        continue;
      }

      const from = this.nodeIndex.get(member.steamId32);
      if (from === undefined) {
        continue;
      }

      for (const friend of friends) {
        const friendId = SteamIdService.tryTo32(friend.steamid);
        if (friendId === null) {
          continue;
        }
        const to = this.nodeIndex.get(friendId);
        if (to === undefined || to === from) {
          continue;
        }
        // Undirected: either side's friends list is enough
        this.adjacency[from].add(to);
        this.adjacency[to].add(from);
      }
    }
  }

  /**
   * Connected components of the current graph with at least two members.
   * Parties are ordered by the roster position of their first member and
   * list their members in roster order.
   */
  computeParties(): SteamId32[][] {
    const count = this.nodeList.length;
    const parent = Array.from({ length: count }, (_, i) => i);
    const rank = new Array<number>(count).fill(0);

    const find = (x: number): number => {
      let root = x;
      while (parent[root] !== root) {
        root = parent[root];
      }
      // Path compression
      let node = x;
      while (parent[node] !== root) {
        const next = parent[node];
        parent[node] = root;
        node = next;
      }
      return root;
    };

    const union = (a: number, b: number) => {
      const ra = find(a);
      const rb = find(b);
      if (ra === rb) return;
      if (rank[ra] < rank[rb]) {
        parent[ra] = rb;
      } else if (rank[ra] > rank[rb]) {
        parent[rb] = ra;
      } else {
        parent[rb] = ra;
        rank[ra]++;
      }
    };

    this.adjacency.forEach((neighbours, node) => {
      for (const other of neighbours) {
        union(node, other);
      }
    });

    const components = new Map<number, SteamId32[]>();
    for (let node = 0; node < count; node++) {
      const root = find(node);
      const component = components.get(root);
      if (component) {
        component.push(this.nodeList[node]);
      } else {
        components.set(root, [this.nodeList[node]]);
      }
    }

    // Map iteration follows insertion order, i.e. the first member's position
    this.parties = [...components.values()].filter((component) => component.length > 1);

    this.partyOf.clear();
    this.parties.forEach((party, index) => {
      for (const member of party) {
        this.partyOf.set(member, index);
      }
    });

    return this.getParties();
  }

  /**
   * Rebuild the graph and recompute the parties in one step.
   */
  update(roster: Iterable<PartyMember>): SteamId32[][] {
    this.rebuild(roster);
    return this.computeParties();
  }

  getParties(): SteamId32[][] {
    return this.parties.map((party) => [...party]);
  }

  partyIndexOf(steamId: SteamId32): number | null {
    return this.partyOf.get(steamId) ?? null;
  }

  /**
   * Marker for the player list. `★` when the local player is in the same
   * party, `■` otherwise; the colour identifies the party.
   */
  indicatorFor(steamId: SteamId32, selfId?: SteamId32 | null): PartyIndicator | null {
    const index = this.partyOf.get(steamId);
    if (index === undefined) {
      return null;
    }
    const withSelf = selfId != null && this.partyOf.get(selfId) === index;
    return {
      symbol: withSelf ? PARTY_SYMBOL_WITH_SELF : PARTY_SYMBOL,
      color: PARTY_COLORS[index % PARTY_COLORS.length],
    };
  }

  nodes(): SteamId32[] {
    return [...this.nodeList];
  }

  /**
   * Each undirected edge once, as a pair ordered by roster position.
   */
  edges(): Array<[SteamId32, SteamId32]> {
    const result: Array<[SteamId32, SteamId32]> = [];
    this.adjacency.forEach((neighbours, node) => {
      for (const other of [...neighbours].sort((a, b) => a - b)) {
        if (other > node) {
          result.push([this.nodeList[node], this.nodeList[other]]);
        }
      }
    });
    return result;
  }
}
