import { Box, Text } from "ink";
import type { DiagramLine } from "../render/diagram.js";

export type SummaryPaneProps = {
	diagramLines: DiagramLine[];
	blockedReasons: string[];
};

export function SummaryPane({ diagramLines, blockedReasons }: SummaryPaneProps): JSX.Element {
	return (
		<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
			<Text dimColor>Summary</Text>
			{diagramLines.map((line) => (
				<Text key={line.id}>
					{line.segments.map((segment) => (
						<Text key={segment.id} color={segment.color} dimColor={segment.dim}>
							{segment.text}
						</Text>
					))}
				</Text>
			))}
			{blockedReasons.map((reason) => (
				<Text key={reason} dimColor>
					{reason}
				</Text>
			))}
		</Box>
	);
}
