export interface IClock {
  now(): Date;
}
