export type * from "./bulk";
export type * from "./dashboard";
export type * from "./transaction";
