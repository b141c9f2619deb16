export interface ITestCase {
	Test_ID: string;
	Feature: string;
	Test_Scenario: string;
	Steps: string[];
	Expected_Result: string;
	Grounded_In: string[];
}

export type TestCaseResult =
	| { testcases: unknown[] }
	| { raw: string; note: string; testcases: unknown[] };

export type FeatureKeyword = 'SAVE15';
