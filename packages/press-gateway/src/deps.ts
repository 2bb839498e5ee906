import type { ArtifactStore, LeaseManager, StateLedger, WorkItemStore } from "@pressline/press-db";

export interface GatewayDeps {
  items: WorkItemStore;
  ledger: StateLedger;
  leases: LeaseManager;
  artifacts: ArtifactStore;
}
