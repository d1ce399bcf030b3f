import type { TriviaStore } from "../store/types";

/** Everything a request handler may touch; built once at startup. */
export type AppContext = {
  store: TriviaStore;
  /** Uniform in [0, 1); `Math.random` outside tests. */
  random: () => number;
};
