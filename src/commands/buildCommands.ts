// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// buildCommands() returns the JSON payloads that get PUT to Discord's API.
//
// GOTCHA: global commands can take up to an hour to propagate. Guild commands update
// instantly, so set GUILD_ID while developing.

import { data as applicantData } from "./applicant.js";
import { data as countersData } from "./counters.js";
import { data as strikeData } from "./strike.js";
import { data as suggestData } from "./suggest.js";
import { data as ticketData } from "./ticket.js";

export function buildCommands() {
  return [
    // Member-facing
    suggestData.toJSON(),
    ticketData.toJSON(),

    // Staff
    strikeData.toJSON(),
    applicantData.toJSON(),
    countersData.toJSON(),
  ];
}
