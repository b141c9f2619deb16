import { FeatureKeyword, ITestCase } from '../../types';
import { UNKNOWN_SOURCE } from '../rag/context';

/**
 * Sources cited by the canonical discount-code cases, in citation order.
 */
export const GROUNDING_PRIORITY = ['product_specs.md', 'checkout.html', 'ui_ux_guide.txt', 'api_endpoints.json'];

export const DISCOUNT_PERCENT = 15;

/**
 * Recognizes the discount-code feature in a free-text request.
 * Only `SAVE15` and `SAVE 15` are accepted, in any letter case.
 */
export const matchFeatureKeyword = (query: string): FeatureKeyword | null => {
	const upper = query.toUpperCase();
	return upper.includes('SAVE15') || upper.includes('SAVE 15') ? 'SAVE15' : null;
};

/**
 * Priority sources that are available, in priority order; failing that every available
 * source as given; failing that a single placeholder.
 */
export const selectGrounding = (availableSources: string[]): string[] => {
	const grounded = GROUNDING_PRIORITY.filter((source) => availableSources.includes(source));
	if (grounded.length > 0) return grounded;
	return availableSources.length > 0 ? [...availableSources] : [UNKNOWN_SOURCE];
};

type CaseTemplate = Omit<ITestCase, 'Grounded_In'>;

const discountCases = (keyword: FeatureKeyword): CaseTemplate[] => {
	const percent = DISCOUNT_PERCENT;
	const remaining = (100 - percent) / 100;
	const lower = keyword.toLowerCase();

	return [
		{
			Test_ID: 'TC-001',
			Feature: 'Discount Code - Valid',
			Test_Scenario: `Apply valid discount code ${keyword} and verify total reduced by ${percent}%.`,
			Steps: [
				'Open the checkout page (checkout.html).',
				'Add items to cart (e.g., Widget A qty 2 @ $30, Widget B qty 1 @ $50).',
				'Observe pre-discount subtotal (2*30 + 1*50 = $110).',
				`Enter discount code '${keyword}' into the discount input and click Apply.`,
				`Verify the discount is applied and the displayed total equals pre-discount total * ${remaining}.`,
			],
			Expected_Result: `Total after applying ${keyword} equals pre-discount total * ${remaining} (${percent}% off). UI indicates discount applied.`,
		},
		{
			Test_ID: 'TC-002',
			Feature: 'Discount Code - Invalid',
			Test_Scenario: 'Enter an invalid discount code and verify no discount is applied and appropriate error shown.',
			Steps: [
				'Open the checkout page.',
				'Add one or more items to cart.',
				"Enter discount code 'BADCODE' into the discount field and click Apply.",
				'Verify an error message or invalid-code feedback is displayed and the total remains unchanged.',
			],
			Expected_Result: 'No discount applied; UI shows an invalid-code message and total equals pre-discount total.',
		},
		{
			Test_ID: 'TC-003',
			Feature: 'Discount Code - Blank',
			Test_Scenario: 'Submit an empty or whitespace-only discount code and verify no effect and possible validation.',
			Steps: [
				'Open the checkout page.',
				'Add items to cart.',
				'Leave the discount input blank or enter spaces and click Apply.',
				'Verify the system either shows a validation message or simply does not change the total.',
			],
			Expected_Result: 'No discount applied; either a validation error is displayed or the total remains unchanged.',
		},
		{
			Test_ID: 'TC-004',
			Feature: 'Discount Code - Format/Case Handling',
			Test_Scenario: `Apply ' ${lower} ' (leading/trailing spaces) and '${lower}' (lowercase) and verify whether discount applies.`,
			Steps: [
				'Open the checkout page.',
				'Add items to cart.',
				`Enter discount code ' ${lower} ' (spaces) and click Apply; note result.`,
				`Clear and enter discount code '${lower}' (all lowercase) and click Apply; note result.`,
				'Verify whether discount is applied in each case according to the system behavior.',
			],
			Expected_Result:
				'If system is case-insensitive/trim-enabled then discount applies; otherwise appropriate invalid-code behavior occurs. Test must record observed behavior.',
		},
	];
};

/**
 * Canonical test cases for a recognized feature, grounded in whichever known
 * sources are available. Output depends only on the arguments.
 */
export const synthesize = (keyword: FeatureKeyword, availableSources: string[]): ITestCase[] => {
	const grounded = selectGrounding(availableSources);
	return discountCases(keyword).map((template) => ({ ...template, Grounded_In: [...grounded] }));
};
