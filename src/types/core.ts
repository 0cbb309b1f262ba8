export type IsoDateString = string;

export type ActorType = "member" | "librarian" | "system";

export type SubjectType = "book" | "loan" | "user" | "rating" | "job";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
