import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { StandardFileTypes } from '../engine/file-types.js';
import { literal, USE_MAXIMUM } from '../engine/symbols.js';
import {
  CONTRACT_DOCUMENT_COMMENT,
  createDriver,
  ToolContractBuilder,
  toolContractFromDocument,
  toolContractToDocument,
} from '../engine/tool-contract.js';
import {
  InvalidDocumentError,
  InvalidIdError,
  InvalidSymbolError,
  MalformedContractError,
} from '../lib/errors.js';

import {
  createFilterBuilder,
  createFilterContract,
  createGatherContract,
  createScatterContract,
  FILTER_TASK_ID,
  GATHER_TASK_ID,
  MIN_LENGTH_ID,
  MODE_ID,
} from './fixtures.js';

describe('ToolContractBuilder', () => {
  it('rejects malformed task ids', () => {
    assert.throws(
      () =>
        new ToolContractBuilder({
          taskId: 'filter_reads',
          name: 'Filter',
          description: '',
          version: '0.1.0',
          driver: createDriver('demo-filter'),
        }),
      InvalidIdError
    );
  });

  it('rejects output default names with path separators', () => {
    const builder = createFilterBuilder();
    assert.throws(
      () =>
        builder.addOutputFileType(StandardFileTypes.txt, 'x', 'X', '', [
          'sub',
          'dir/x',
        ]),
      {
        name: 'MalformedContractError',
        message:
          'Output \'x\' default name ["sub","dir/x"] must be a file name without path separators',
      }
    );
    assert.throws(
      () => builder.addOutputFileType(StandardFileTypes.txt, 'y', 'Y', '', '..'),
      MalformedContractError
    );
  });

  it('applies task defaults', () => {
    const { task } = createGatherContract();
    assert.equal(task.isDistributed, true);
    assert.deepEqual(task.nproc, USE_MAXIMUM);
    assert.deepEqual(task.resourceTypes, []);
  });

  it('keeps declared order of inputs, outputs and options', () => {
    const { task } = createFilterContract();
    assert.equal(task.taskType, 'standard');
    assert.deepEqual(
      task.outputFileTypes.map((output) => output.label),
      ['fasta_out', 'report']
    );
    assert.deepEqual(
      task.options.map((option) => option.id),
      [MIN_LENGTH_ID, MODE_ID]
    );
    assert.deepEqual(task.nproc, literal(4));
  });

  it('adds the chunk prefix to scatter keys', () => {
    const contract = new ToolContractBuilder({
      taskId: 'demo.tasks.split',
      name: 'Split',
      description: '',
      version: '0.1.0',
      driver: createDriver('demo-split'),
      taskType: 'scattered',
      chunkKeys: ['fasta_id', '$chunk.contig_id'],
    })
      .addInputFileType(StandardFileTypes.fasta, 'fasta_in', 'Reads', '')
      .addOutputFileType(StandardFileTypes.chunk, 'chunks', 'Chunks', '')
      .build();

    assert.equal(contract.task.taskType, 'scattered');
    if (contract.task.taskType === 'scattered') {
      assert.deepEqual(contract.task.chunkKeys, [
        '$chunk.fasta_id',
        '$chunk.contig_id',
      ]);
      assert.deepEqual(contract.task.maxNchunks, USE_MAXIMUM);
    }
  });

  it('records command line arguments for every option', () => {
    assert.deepEqual(createFilterBuilder().toCliArguments(), [
      {
        flag: '--min-length',
        optionId: MIN_LENGTH_ID,
        type: 'integer',
        default: 50,
        help: 'Minimum read length',
      },
      {
        flag: '--mode',
        optionId: MODE_ID,
        type: 'string',
        default: 'fast',
        choices: ['fast', 'exact'],
        help: 'Run mode',
      },
    ]);
  });

  it('derives the flag from the option id when none is given', () => {
    const builder = createFilterBuilder();
    const [option] = createFilterContract().task.options;
    assert.ok(option);
    builder.addOptionSchema(option);
    assert.equal(builder.toCliArguments()[2]?.flag, '--min_length');
  });
});

describe('toolContractToDocument', () => {
  it('writes the standard document layout', () => {
    assert.deepEqual(toolContractToDocument(createFilterContract()), {
      version: '1.2.0',
      tool_contract_id: FILTER_TASK_ID,
      driver: {
        exe: 'demo-filter --resolved-tool-contract',
        env: { DEMO_MODE: 'test' },
      },
      tool_contract: {
        _comment: CONTRACT_DOCUMENT_COMMENT,
        tool_contract_id: FILTER_TASK_ID,
        name: 'Filter reads',
        description: 'Drop reads shorter than a threshold',
        task_type: 'standard',
        is_distributed: true,
        input_types: [
          {
            file_type_id: 'PacBio.FileTypes.Fasta',
            id: 'fasta_in',
            title: 'Reads',
            description: 'Reads to filter',
          },
        ],
        output_types: [
          {
            file_type_id: 'PacBio.FileTypes.Fasta',
            id: 'fasta_out',
            title: 'Filtered reads',
            description: 'Reads that passed',
            default_name: null,
          },
          {
            file_type_id: 'PacBio.FileTypes.JsonReport',
            id: 'report',
            title: 'Filter report',
            description: 'Counts of kept and dropped reads',
            default_name: null,
          },
        ],
        schema_options: [
          {
            id: MIN_LENGTH_ID,
            name: 'Min length',
            description: 'Minimum read length',
            type: 'integer',
            default: 50,
          },
          {
            id: MODE_ID,
            name: 'Mode',
            description: 'Run mode',
            type: 'string',
            default: 'fast',
            choices: ['fast', 'exact'],
          },
        ],
        nproc: 4,
        resource_types: ['$tmpdir', '$logfile'],
      },
    });
  });

  it('writes scatter and gather fields', () => {
    const scatter = toolContractToDocument(createScatterContract());
    assert.deepEqual(scatter.tool_contract.chunk_keys, ['$chunk.fasta_id']);
    assert.equal(scatter.tool_contract.nchunks, 10);
    assert.equal(scatter.tool_contract.chunk_key, undefined);

    const gather = toolContractToDocument(createGatherContract());
    assert.equal(gather.tool_contract.chunk_key, '$chunk.fasta_id');
    assert.equal(gather.tool_contract.nproc, '$max_nproc');
    assert.equal(gather.tool_contract.output_types[0]?.default_name, 'gathered.fasta');
  });

  it('rejects contracts without input or output file types', () => {
    const empty = new ToolContractBuilder({
      taskId: 'demo.tasks.empty',
      name: 'Empty',
      description: '',
      version: '0.1.0',
      driver: createDriver('demo-empty'),
    });
    assert.throws(() => toolContractToDocument(empty.build()), {
      name: 'MalformedContractError',
      message: 'Tool contract demo.tasks.empty declares no input file types',
    });

    empty.addInputFileType(StandardFileTypes.txt, 'txt_in', 'Text', '');
    assert.throws(() => toolContractToDocument(empty.build()), {
      message: 'Tool contract demo.tasks.empty declares no output file types',
    });
  });
});

describe('toolContractFromDocument', () => {
  it('round-trips every task type', () => {
    for (const contract of [
      createFilterContract(),
      createScatterContract(),
      createGatherContract(),
    ]) {
      assert.deepEqual(
        toolContractFromDocument(toolContractToDocument(contract)),
        contract
      );
    }
  });

  it('reads the max symbol for nchunks', () => {
    const document = toolContractToDocument(createScatterContract());
    document.tool_contract.nchunks = '$max_nchunks';
    const { task } = toolContractFromDocument(document);
    assert.equal(task.taskType, 'scattered');
    if (task.taskType === 'scattered') {
      assert.deepEqual(task.maxNchunks, USE_MAXIMUM);
    }
  });

  it('rejects an inner id that disagrees with the outer id', () => {
    const document = toolContractToDocument(createFilterContract());
    document.tool_contract.tool_contract_id = 'demo.tasks.other';
    assert.throws(() => toolContractFromDocument(document), {
      name: 'MalformedContractError',
      message: `Tool contract id mismatch: ${FILTER_TASK_ID} vs demo.tasks.other`,
    });
  });

  it('rejects a gathered contract without a chunk key', () => {
    const document = toolContractToDocument(createGatherContract());
    delete document.tool_contract.chunk_key;
    assert.throws(
      () => toolContractFromDocument(document),
      MalformedContractError
    );
  });

  it('rejects an unknown nproc symbol', () => {
    const document = toolContractToDocument(createFilterContract());
    document.tool_contract.nproc = '$max_nchunks';
    assert.throws(() => toolContractFromDocument(document), InvalidSymbolError);
  });

  it('rejects default names that point outside the output directory', () => {
    for (const defaultName of ['../etc/evil.txt', '/abs/x.txt']) {
      const document = toolContractToDocument(createFilterContract());
      document.tool_contract.output_types = document.tool_contract.output_types.map(
        (output) => ({ ...output, default_name: defaultName })
      );
      assert.throws(() => toolContractFromDocument(document), (err: unknown) => {
        assert.ok(err instanceof InvalidDocumentError);
        assert.match(
          err.message,
          /default_name must be a file name without path separators/
        );
        return true;
      });
    }
  });

  it('rejects unknown fields and wrong shapes', () => {
    const document = toolContractToDocument(createGatherContract());
    assert.throws(
      () => toolContractFromDocument({ ...document, extra: true }),
      InvalidDocumentError
    );
    assert.throws(() => toolContractFromDocument('not a contract'), {
      name: 'InvalidDocumentError',
    });
  });

  it('reports the offending task id', () => {
    const document = toolContractToDocument(createGatherContract());
    const renamed = { ...document, tool_contract_id: 'gather' };
    renamed.tool_contract = { ...document.tool_contract, tool_contract_id: 'gather' };
    assert.throws(() => toolContractFromDocument(renamed), InvalidIdError);
    assert.equal(document.tool_contract_id, GATHER_TASK_ID);
  });
});
