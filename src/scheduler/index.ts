export { dueOwners, selectDueOwners, isOwnerDue } from "./dueOwners";
export type { SchedulableOwner } from "./dueOwners";
