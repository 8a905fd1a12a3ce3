// Signal catalogue: declarations owned by identifier, names as lookups

import type { BusDeclaration, SignalDeclaration, SignalId } from '../types/vcd.js';

export class SignalCatalogue {
  private declarations: Map<SignalId, SignalDeclaration> = new Map();
  private scalarNames: Map<string, SignalId> = new Map();
  private busList: BusDeclaration[] = [];

  /**
   * Register a width-1 declaration. Several names may share one identifier;
   * the first identifier registered under a name keeps it.
   */
  addScalar(decl: SignalDeclaration): void {
    if (!this.declarations.has(decl.id)) {
      this.declarations.set(decl.id, decl);
    }
    if (!this.scalarNames.has(decl.name)) {
      this.scalarNames.set(decl.name, decl.id);
    }
  }

  addBus(decl: BusDeclaration): void {
    if (!this.declarations.has(decl.id)) {
      this.declarations.set(decl.id, decl);
    }
    this.busList.push(decl);
  }

  get(id: SignalId): SignalDeclaration | undefined {
    return this.declarations.get(id);
  }

  scalarId(name: string): SignalId | undefined {
    return this.scalarNames.get(name);
  }

  // Names in registration order
  scalarNamesList(): string[] {
    return [...this.scalarNames.keys()];
  }

  buses(): readonly BusDeclaration[] {
    return this.busList;
  }

  /**
   * First bus named `base` whose range contains `index`
   */
  findBus(base: string, index: number): BusDeclaration | undefined {
    return this.busList.find(
      bus => bus.name === base && index >= Math.min(bus.msb, bus.lsb) && index <= Math.max(bus.msb, bus.lsb)
    );
  }

  get isEmpty(): boolean {
    return this.scalarNames.size === 0 && this.busList.length === 0;
  }
}
