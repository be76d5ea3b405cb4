// milliseconds since the epoch; injectable so tests control time
export type Clock = () => number;
