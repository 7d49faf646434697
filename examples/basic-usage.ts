import { CommunityClient } from "../src/index.js";
import { ConsoleObservability } from "../src/observability/console.js";
import { CommunityError } from "../src/core/errors.js";
import { NodeRef } from "../src/resources/nodes.js";

async function main() {
  const client = await CommunityClient.create({
    communityUrl: process.env.COMMUNITY_URL || "https://community.example.com",
    auth: {
      type: "oauth2",
      accessToken: process.env.COMMUNITY_OAUTH2_TOKEN || "",
    },
    retry: {
      maxRetries: 3,
      baseDelay: 250,
      maxDelay: 5000,
      jitter: true,
    },
    timeout: 30000,
    observability: new ConsoleObservability({ pretty: true, level: "info" }),
  });

  try {
    console.log("Counting boards...");
    const boards = await client.boards.getTotalCount();
    console.log("Boards:", boards);

    console.log("Creating a board...");
    const [status, error] = await client.boards
      .create(
        { id: "product-ideas", title: "Product Ideas", discussionStyle: "idea", parentCategoryId: "products" },
        { returnStatus: true, returnErrorMessages: true }
      )
      .then((result) => (Array.isArray(result) ? result : [result]));
    console.log("Status:", status, "Error:", error);

    console.log("Posting a message...");
    const messageId = await client.messages.create(
      {
        subject: "Welcome",
        body: "<p>Share your ideas here.</p>",
        node: NodeRef.byUrl("https://community.example.com/t5/product-ideas/idb-p/product-ideas"),
        tags: ["welcome"],
      },
      { returnId: true }
    );
    console.log("Message:", messageId);

    console.log("Walking recent messages...");
    for await (const page of client.liql.paginate({
      select: ["id", "subject"],
      from: "messages",
      orderBy: "post_time",
      limit: 50,
    }, { maxPages: 3 })) {
      console.log(`Page with ${page.length} messages`);
    }

    console.log("Users online:", await client.users.getOnlineUserCount());
  } catch (error) {
    if (error instanceof CommunityError) {
      console.error(`Request failed [${error.category}]:`, error.message);
    } else {
      console.error("Unexpected error:", error);
    }
  }
}

main().catch(console.error);
