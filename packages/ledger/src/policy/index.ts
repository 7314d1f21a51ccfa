/**
 * Policy module - Collateralization math
 */

export {
	COLLATERAL_RATIO,
	RATIO_DENOMINATOR,
	maxBorrow,
	availableToBorrow,
	requiredCollateral,
	isCollateralized,
} from "./collateral-policy.js";
