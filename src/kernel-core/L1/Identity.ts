import type { PrincipalId } from '../L0/Ontology.js';

// --- 1. Role Set ---
// An explicit, first-class set of principals. Each component owns its own sets
// and hands them out by reference; there is no ambient permission state.
export class RoleSet {
    private members: Set<PrincipalId>;

    constructor(public readonly role: string, members: Iterable<PrincipalId> = []) {
        this.members = new Set(members);
    }

    public has(id: PrincipalId): boolean {
        return this.members.has(id);
    }

    /**
     * Returns false when the principal was already a member.
     */
    public grant(id: PrincipalId): boolean {
        if (this.members.has(id)) return false;
        this.members.add(id);
        return true;
    }

    public revoke(id: PrincipalId): boolean {
        return this.members.delete(id);
    }

    public list(): PrincipalId[] {
        return [...this.members];
    }

    public get size(): number {
        return this.members.size;
    }
}

// --- 2. Owning Authority ---
// The owner is implicitly privileged for every role it administers,
// without being a member of any of them.
export class Authority {
    constructor(public readonly owner: PrincipalId) { }

    public isOwner(id: PrincipalId): boolean {
        return id === this.owner;
    }

    public permits(id: PrincipalId, roles: RoleSet): boolean {
        return this.isOwner(id) || roles.has(id);
    }
}
