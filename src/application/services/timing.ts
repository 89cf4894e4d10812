export type Sleep = (ms: number) => Promise<void>;

export type Clock = () => number;

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export const realClock: Clock = () => Date.now();
