export { type CheckoutOptions, checkout } from "./checkout";
export {
	type ConfigInitOptions,
	configInit,
	configShow,
} from "./config/index";
export { type InstallOptions, install } from "./install";
export { type ListOptions, list } from "./list";
export { rebuild } from "./rebuild";
export { remove } from "./remove";
