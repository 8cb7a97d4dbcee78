/** Validated SimulationConfig, loaded once before the engine is built. */
export const SIMULATION_CONFIG_TOKEN = 'SimulationConfig';

/** IClock driving the simulation (wall time or replay). */
export const SIMULATION_CLOCK_TOKEN = 'SimulationClock';

/** The SimulatedBroker instance behind the environment. */
export const SIMULATED_BROKER_TOKEN = 'SimulatedBroker';

/** The SimulatedEnvironment, also usable as an IEnvironment. */
export const SIMULATED_ENVIRONMENT_TOKEN = 'SimulatedEnvironment';
