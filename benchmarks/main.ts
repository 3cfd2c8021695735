import { dequeOps } from "./deque_ops";
import { multiSetOps } from "./multiset_ops";
import { orderedSetOps } from "./ordered_set_ops";

void (async function () {
  console.log("# Benchmark Results");
  console.log(
    "Output of\n```bash\nnpm run benchmarks -s > benchmark_results.md\n```"
  );
  console.log(
    "Each benchmark uses seeded random inputs, so runs are repeatable up to timing noise.\n"
  );

  await dequeOps();
  multiSetOps();
  orderedSetOps();
})();
