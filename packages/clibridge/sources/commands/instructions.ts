import { channelDeliveryInstructions } from "../channels/channelDeliveryInstructions.js";

export function instructionsCommand(channel: string): void {
    const instructions = channelDeliveryInstructions(channel);
    if (instructions === null) {
        process.exitCode = 1;
        console.error(`No delivery instructions for channel: ${channel}`);
        return;
    }
    console.log(instructions);
}
