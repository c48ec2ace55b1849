// Clock - source of "now" for use cases

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
