import asymmetricPenalty from "../instances/asymmetric-penalty.json";
import fourCities from "../instances/four-cities.json";
import twoCities from "../instances/two-cities.json";

/*
 * ExampleInstances
 *
 * The instances bundled with the command-line driver, by name.
 * They are validated when loaded, like any other instance.
 */

export const ExampleInstances: {[name: string]: unknown} = {
    "asymmetric-penalty": asymmetricPenalty,
    "four-cities": fourCities,
    "two-cities": twoCities,
};
