export const testCasePrompt = (context: string, userQuery: string): string =>
	[
		"Return ONLY a JSON array (start with '[' and end with ']'). Each element must " +
			'include Test_ID, Feature, Test_Scenario, Steps (array), Expected_Result, Grounded_In.',
		'',
		`Context:\n${context}`,
		'',
		`User request:\n${userQuery}`,
		'',
	].join('\n');

export const seleniumPrompt = (testCase: Record<string, unknown>, html: string, context: string): string =>
	[
		'You are a Selenium (Python) expert. Using only the provided HTML and context docs, ' +
			'generate a runnable Selenium Python script (standalone) that implements the test case.',
		'',
		'Constraints:',
		'- Use Chrome webdriver.',
		'- Use stable selectors (ids, names, CSS selectors) matching the provided HTML.',
		'- Include comments about required pip modules at top.',
		'- The test must conclude with an assertion matching Expected_Result.',
		'- Do NOT invent features not present in the HTML or docs.',
		'',
		`Test case:\n${JSON.stringify(testCase, null, 2)}`,
		'',
		`HTML:\n${html}`,
		'',
		`Context:\n${context}`,
		'',
		'Output: ONLY the Python test script (no extra text).',
	].join('\n');
