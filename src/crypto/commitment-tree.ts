/**
 * Commitment tree and proofs
 *
 * A chain's provable store is committed as a sha256 Merkle tree whose leaves
 * are `(path, sha256(value))` pairs sorted by path. The root of that tree is
 * what the light client hands out as the trusted root for a height.
 *
 * - Membership is proven by the sibling hashes from the leaf up to the root.
 *   Left/right placement is derived from the leaf index and the leaf count, so
 *   the proof carries no direction flags a prover could flip.
 * - Non-membership is proven by the adjacent leaves bracketing the missing
 *   path (or a single edge leaf when the path sorts before the first or after
 *   the last leaf).
 *
 * An odd node at the end of a level is paired with itself.
 */

import { createHash } from 'crypto';

export interface MembershipProof {
    type: 'membership';
    leafIndex: number;
    leafCount: number;
    siblings: string[];
}

export interface NeighbourLeaf {
    path: string;
    valueHash: string;
    proof: MembershipProof;
}

export interface NonMembershipProof {
    type: 'non-membership';
    leafCount: number;
    left?: NeighbourLeaf;
    right?: NeighbourLeaf;
}

export type CommitmentProof = MembershipProof | NonMembershipProof;

function sha256(input: string | Uint8Array): string {
    return createHash('sha256').update(input).digest('hex');
}

export const EMPTY_ROOT = sha256('empty');

export function hashValue(value: Uint8Array): string {
    return sha256(value);
}

function leafHash(path: string, valueHash: string): string {
    return sha256(`leaf|${path}|${valueHash}`);
}

function nodeHash(left: string, right: string): string {
    return sha256(`node|${left}|${right}`);
}

function computeRoot(leaf: string, proof: MembershipProof): string | null {
    const { leafIndex, leafCount, siblings } = proof;
    if (!Number.isInteger(leafIndex) || !Number.isInteger(leafCount) || leafIndex < 0 || leafIndex >= leafCount) {
        return null;
    }

    let hash = leaf;
    let index = leafIndex;
    let width = leafCount;
    let level = 0;

    while (width > 1) {
        const sibling = siblings[level];
        if (sibling === undefined) {
            return null;
        }
        const isRightChild = index % 2 === 1;
        if (!isRightChild && index + 1 >= width && sibling !== hash) {
            // The last node of an odd level can only be paired with itself
            return null;
        }
        hash = isRightChild ? nodeHash(sibling, hash) : nodeHash(hash, sibling);
        index = Math.floor(index / 2);
        width = Math.ceil(width / 2);
        level++;
    }

    return level === siblings.length ? hash : null;
}

function verifyNeighbour(root: string, leafCount: number, neighbour: NeighbourLeaf): boolean {
    if (neighbour.proof.type !== 'membership' || neighbour.proof.leafCount !== leafCount) {
        return false;
    }
    return computeRoot(leafHash(neighbour.path, neighbour.valueHash), neighbour.proof) === root;
}

/**
 * Checks that `value` is stored at `path` in the tree committed to by `root`.
 */
export function verifyMembership(root: string, path: string, value: Uint8Array, proof: CommitmentProof): boolean {
    if (proof.type !== 'membership') {
        return false;
    }
    return computeRoot(leafHash(path, hashValue(value)), proof) === root;
}

/**
 * Checks that nothing is stored at `path` in the tree committed to by `root`.
 */
export function verifyNonMembership(root: string, path: string, proof: CommitmentProof): boolean {
    if (proof.type !== 'non-membership') {
        return false;
    }
    const { leafCount, left, right } = proof;

    if (leafCount === 0) {
        return !left && !right && root === EMPTY_ROOT;
    }
    if (left && !(left.path < path && verifyNeighbour(root, leafCount, left))) {
        return false;
    }
    if (right && !(right.path > path && verifyNeighbour(root, leafCount, right))) {
        return false;
    }

    if (left && right) {
        return right.proof.leafIndex === left.proof.leafIndex + 1;
    }
    if (left) {
        return left.proof.leafIndex === leafCount - 1;
    }
    if (right) {
        return right.proof.leafIndex === 0;
    }
    return false;
}

interface Leaf {
    path: string;
    valueHash: string;
    hash: string;
}

/**
 * Immutable view of a committed store at one height.
 */
export class CommitmentSnapshot {
    private readonly leaves: Leaf[];
    private readonly levels: string[][];

    constructor(entries: ReadonlyMap<string, Uint8Array>) {
        this.leaves = Array.from(entries.entries())
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([path, value]) => {
                const valueHash = hashValue(value);
                return { path, valueHash, hash: leafHash(path, valueHash) };
            });
        this.levels = this.buildLevels();
    }

    private buildLevels(): string[][] {
        if (this.leaves.length === 0) {
            return [];
        }
        const levels: string[][] = [this.leaves.map(leaf => leaf.hash)];
        let current = levels[0];
        while (current.length > 1) {
            const next: string[] = [];
            for (let i = 0; i < current.length; i += 2) {
                const left = current[i];
                const right = i + 1 < current.length ? current[i + 1] : left;
                next.push(nodeHash(left, right));
            }
            levels.push(next);
            current = next;
        }
        return levels;
    }

    public get size(): number {
        return this.leaves.length;
    }

    public root(): string {
        if (this.levels.length === 0) {
            return EMPTY_ROOT;
        }
        return this.levels[this.levels.length - 1][0];
    }

    public has(path: string): boolean {
        return this.indexOf(path) >= 0;
    }

    private indexOf(path: string): number {
        return this.leaves.findIndex(leaf => leaf.path === path);
    }

    private proofAt(leafIndex: number): MembershipProof {
        const siblings: string[] = [];
        let index = leafIndex;
        for (let level = 0; level < this.levels.length - 1; level++) {
            const nodes = this.levels[level];
            const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
            siblings.push(siblingIndex < nodes.length ? nodes[siblingIndex] : nodes[index]);
            index = Math.floor(index / 2);
        }
        return { type: 'membership', leafIndex, leafCount: this.leaves.length, siblings };
    }

    private neighbourAt(leafIndex: number): NeighbourLeaf {
        const leaf = this.leaves[leafIndex];
        return { path: leaf.path, valueHash: leaf.valueHash, proof: this.proofAt(leafIndex) };
    }

    public proveMembership(path: string): MembershipProof | null {
        const index = this.indexOf(path);
        return index >= 0 ? this.proofAt(index) : null;
    }

    public proveNonMembership(path: string): NonMembershipProof | null {
        if (this.has(path)) {
            return null;
        }
        const rightIndex = this.leaves.findIndex(leaf => leaf.path > path);
        const leftIndex = rightIndex === -1 ? this.leaves.length - 1 : rightIndex - 1;

        const proof: NonMembershipProof = { type: 'non-membership', leafCount: this.leaves.length };
        if (leftIndex >= 0) {
            proof.left = this.neighbourAt(leftIndex);
        }
        if (rightIndex >= 0) {
            proof.right = this.neighbourAt(rightIndex);
        }
        return proof;
    }
}
